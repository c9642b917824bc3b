import { encodeUtf8 } from "../codec/binary";

export type MatchOptions = {
    /**
     * Keep `$`-prefixed topics (broker internals such as `$SYS/...`) away from
     * filters that start with `+` or `#`. Defaults to `true`.
     */
    excludeReserved?: boolean;
};

export function isExactFilter(filter: string): boolean {
    return filter.indexOf("+") === -1 && filter.indexOf("#") === -1;
}

function validateLevels(value: string, kind: string): string | null {
    if (value.length === 0) {
        return `${kind} must not be empty`;
    }
    if (encodeUtf8(value).length > 0xffff) {
        return `${kind} exceeds 65535 bytes`;
    }
    if (value.split("/").some((level) => level.length === 0)) {
        return `${kind} must not contain empty levels`;
    }
    return null;
}

/**
 * Check a subscription filter. Returns the reason it is malformed, or `null`.
 */
export function validateFilter(filter: string): string | null {
    const invalid = validateLevels(filter, "Topic filter");
    if (invalid) {
        return invalid;
    }

    const levels = filter.split("/");
    for (let i = 0; i < levels.length; i++) {
        const level = levels[i] ?? "";
        if (level === "#") {
            if (i !== levels.length - 1) {
                return "'#' is only allowed as the last level";
            }
            continue;
        }
        if (level === "+") {
            continue;
        }
        if (level.includes("+") || level.includes("#")) {
            return "Wildcards must occupy a whole level";
        }
    }
    return null;
}

/**
 * Check a topic name used for publishing. Returns the reason it is malformed, or `null`.
 */
export function validateTopicName(topic: string): string | null {
    const invalid = validateLevels(topic, "Topic");
    if (invalid) {
        return invalid;
    }
    if (!isExactFilter(topic)) {
        return "Wildcards are not allowed in topic names";
    }
    return null;
}

/**
 * MQTT topic filter matching for + and #.
 * - + matches exactly one level
 * - # matches the remaining levels, including none (`a/#` matches `a`)
 *
 * Filters are assumed to have passed {@link validateFilter}.
 */
export function matchTopic(filter: string, topic: string, opts: MatchOptions = {}): boolean {
    const excludeReserved = opts.excludeReserved ?? true;
    if (excludeReserved && topic.startsWith("$") && (filter.startsWith("+") || filter.startsWith("#"))) {
        return false;
    }

    if (filter === topic) {
        return true;
    }

    const f = filter.split("/");
    const t = topic.split("/");

    for (let i = 0; i < f.length; i++) {
        const fp = f[i];

        if (fp === "#") {
            return true;
        }

        if (i >= t.length) {
            return false;
        }

        if (fp === "+") {
            continue;
        }

        if (fp !== t[i]) {
            return false;
        }
    }

    return f.length === t.length;
}
