const ESCAPES: Record<string, string> = { t: '\t', n: '\n', r: '\r', f: '\f' };

const unescape = (value: string) =>
    value.replace(/\\(u[0-9a-fA-F]{4}|[\s\S])/g, (_, escaped: string) => {
        if (escaped.length === 5) return String.fromCharCode(parseInt(escaped.slice(1), 16));
        return ESCAPES[escaped] ?? escaped;
    });

const trailingBackslashes = (line: string) => line.length - line.replace(/\\+$/, '').length;

/** Joins `\`-continued lines and drops blank and comment lines */
const logicalLines = (contents: string) => {
    const lines: string[] = [];
    let current: string | null = null;
    for (const naturalLine of contents.split(/\r\n|\r|\n/)) {
        const line = naturalLine.replace(/^[ \t\f]+/, '');
        if (current === null && (!line || line.startsWith('#') || line.startsWith('!'))) continue;

        const continues = trailingBackslashes(line) % 2 === 1;
        current = (current ?? '') + (continues ? line.slice(0, -1) : line);
        if (!continues) {
            lines.push(current);
            current = null;
        }
    }
    if (current !== null) lines.push(current);
    return lines;
};

const splitEntry = (line: string) => {
    let keyEnd = 0;
    while (keyEnd < line.length && !'=: \t\f'.includes(line[keyEnd])) {
        keyEnd += line[keyEnd] === '\\' ? 2 : 1;
    }
    const rest = line
        .slice(keyEnd)
        .replace(/^[ \t\f]*[=:]?/, '')
        .replace(/^[ \t\f]+/, '');
    return [unescape(line.slice(0, keyEnd)), unescape(rest)] as const;
};

/**
 * Reads `.properties` text the way the Kafka command line tools load their `--command-config` file: `key=value`,
 * `key: value` or `key value`, `#` and `!` comment lines, `\` line continuations and backslash escapes.
 */
export const parseProperties = (contents: string): Record<string, string> =>
    Object.fromEntries(logicalLines(contents).map(splitEntry));
