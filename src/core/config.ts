import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { ConfigError } from './errors';

export const CONFIG = {
    NETWORK: {
        HOST: process.env.MESH_HOST || '127.0.0.1',
        DASHBOARD_PORT_OFFSET: 1000,
    },
    TIMING: {
        HEARTBEAT_INTERVAL_MS: 2000,
        LIVENESS_WINDOW_MS: 3000, // sessions older than this are swept
        CONTROL_REPLY_TIMEOUT_MS: 5000,
        HANDLER_READ_TIMEOUT_MS: 5000,
        CONNECT_TIMEOUT_MS: 10000,
    },
    TRANSFER: {
        CHUNK_SIZE: 1024,
        ACK_TOKEN: 'ACK',
    },
    STORAGE: {
        SHARE_ROOT: process.env.SHARE_ROOT || process.cwd(),
        CREDENTIAL_FILES: ['server/credentials.txt', 'credentials.txt'],
    }
};

export type Credentials = ReadonlyMap<string, string>;

/**
 * Parses a credentials file made of `username password` lines.
 * Blank lines are skipped; everything after the first space is the password.
 */
export function parseCredentials(text: string, source = 'credentials'): Credentials {
    const credentials = new Map<string, string>();
    const lines = text.split(/\r?\n/);

    lines.forEach((raw, i) => {
        const line = raw.trim();
        if (!line) return;

        const sep = line.indexOf(' ');
        if (sep <= 0) {
            throw new ConfigError('INVALID_CREDENTIALS', `${source}:${i + 1}: expected "username password"`);
        }
        credentials.set(line.slice(0, sep), line.slice(sep + 1).trim());
    });

    return credentials;
}

export function resolveCredentialsPath(explicit?: string): string {
    const candidates = explicit
        ? [explicit]
        : process.env.CREDENTIALS_FILE
            ? [process.env.CREDENTIALS_FILE]
            : CONFIG.STORAGE.CREDENTIAL_FILES;

    const found = candidates.find(c => existsSync(c));
    if (!found) {
        throw new ConfigError('MISSING_CREDENTIALS', `Credentials file not found (looked in: ${candidates.join(', ')})`);
    }
    return path.resolve(found);
}

export function loadCredentials(explicit?: string): Credentials {
    const file = resolveCredentialsPath(explicit);
    return parseCredentials(readFileSync(file, 'utf8'), path.basename(file));
}

export function parsePort(value: string | undefined, name: string): number {
    const port = Number(value);
    if (!value || !Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigError('INVALID_ARGUMENT', `${name} must be a port number, got "${value ?? ''}"`);
    }
    return port;
}
