import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { parse } from 'dotenv';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('config-store');

/**
 * Key/value store that outlives the process. Credentials are written here as
 * soon as they are issued.
 */
export interface ConfigStore {
    get(key: string): string | undefined;
    set(key: string, value: string): void;
}

export class InMemoryConfigStore implements ConfigStore {
    private readonly values: Map<string, string>;

    constructor(initial: Record<string, string> = {}) {
        this.values = new Map(Object.entries(initial));
    }

    get(key: string): string | undefined {
        return this.values.get(key);
    }

    set(key: string, value: string): void {
        this.values.set(key, value);
    }

    snapshot(): Record<string, string> {
        return Object.fromEntries(this.values);
    }
}

/**
 * `.env` file store. Reads with dotenv; `set` rewrites the one line holding
 * the key (or appends it) and leaves the rest of the file untouched.
 */
export class DotenvFileStore implements ConfigStore {
    private values: Record<string, string>;

    constructor(private readonly path: string) {
        this.values = existsSync(path) ? parse(readFileSync(path)) : {};
    }

    get(key: string): string | undefined {
        return this.values[key];
    }

    set(key: string, value: string): void {
        const contents = existsSync(this.path) ? readFileSync(this.path, 'utf-8') : '';
        writeFileSync(this.path, upsertDotenvLine(contents, key, value), 'utf-8');
        this.values = { ...this.values, [key]: value };
        logger.debug({ event: 'CONFIG_KEY_PERSISTED', key, path: this.path }, 'Persisted configuration key');
    }
}

/**
 * Replace the assignment of `key` in dotenv text, or append one.
 */
export function upsertDotenvLine(contents: string, key: string, value: string): string {
    const line = `${key}=${quoteDotenvValue(value)}`;
    const lines = contents.length > 0 ? contents.split(/\r?\n/) : [];
    const matcher = new RegExp(`^\\s*(?:export\\s+)?${escapeRegExp(key)}\\s*=`);

    let replaced = false;
    const updated = lines.map((existing) => {
        if (!replaced && matcher.test(existing)) {
            replaced = true;
            return line;
        }
        return existing;
    });

    if (!replaced) {
        if (updated.length > 0 && updated[updated.length - 1] === '') {
            updated.splice(updated.length - 1, 0, line);
        } else {
            updated.push(line, '');
        }
    }

    return updated.join('\n');
}

function quoteDotenvValue(value: string): string {
    return value.includes("'") ? `"${value}"` : `'${value}'`;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
