/**
 * Path glob matching shared by the rule table, the read guard and the
 * manifest builder.
 *
 * Case-sensitive. `**` spans directory separators (and `a/** /b` also matches
 * `a/b`), `*` and `?` stay inside one path segment, every other character is
 * literal. Paths are compared in POSIX form.
 */

import * as path from 'path';
import { LRUCache } from 'lru-cache';

const compiled = new LRUCache<string, RegExp>({ max: 1000 });

const REGEX_SPECIALS = new Set(['.', '+', '^', '$', '(', ')', '[', ']', '{', '}', '|', '\\']);

export function toPosix(p: string): string {
    return p.replace(/\\/g, '/');
}

export function globToRegExp(pattern: string): RegExp {
    const cached = compiled.get(pattern);
    if (cached) return cached;

    const src = toPosix(pattern);
    let out = '';
    for (let i = 0; i < src.length; i++) {
        const c = src[i];
        if (c === '*') {
            if (src[i + 1] === '*') {
                i++;
                if (src[i + 1] === '/') {
                    i++;
                    out += '(?:.*/)?';
                } else {
                    out += '.*';
                }
            } else {
                out += '[^/]*';
            }
        } else if (c === '?') {
            out += '[^/]';
        } else if (REGEX_SPECIALS.has(c)) {
            out += '\\' + c;
        } else {
            out += c;
        }
    }

    const re = new RegExp(`^${out}$`);
    compiled.set(pattern, re);
    return re;
}

export function matchesGlob(filePath: string, pattern: string): boolean {
    return globToRegExp(pattern).test(toPosix(filePath));
}

export function matchesAny(filePath: string, patterns: readonly string[]): boolean {
    return patterns.some((p) => matchesGlob(filePath, p));
}

/** Anchor relative patterns at `root` so they can be matched against absolute paths. */
export function absolutizeGlobs(patterns: readonly string[], root: string): string[] {
    return patterns.map((p) => (path.isAbsolute(p) ? toPosix(p) : toPosix(path.join(root, p))));
}

/** Path of `target` relative to `root`, POSIX separators. */
export function relativePosix(root: string, target: string): string {
    return toPosix(path.relative(root, path.resolve(root, target)));
}
