import Debug from "debug";

/**
 * Root debugger. Enable output with `DEBUG=ferrymq:*`.
 */
export const log = Debug("ferrymq");

export function logger(scope: string): Debug.Debugger {
    return log.extend(scope);
}
