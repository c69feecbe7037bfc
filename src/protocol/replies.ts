import { z } from 'zod';
import { AuthError, AuthRejection, ProtocolError } from '../core/errors';

// Reply datagrams are plain text, except a resolved FETCH which is a JSON object.

export const REPLY = {
    AUTH_OK: 'OK',
    NO_PEERS: 'No active peers',
    NO_FILES: 'No files shared',
    SHARE_OK: 'File shared successfully',
    NO_MATCHES: 'No files found',
    REMOVE_OK: 'File successfully removed from sharing',
    REMOVE_FAILED: 'File removal failed',
    FETCH_NOT_FOUND: 'File not found',
    MALFORMED: 'ERROR: Malformed request',
} as const;

const AUTH_REASONS: Record<AuthRejection, string> = {
    ALREADY_ACTIVE: 'User already logged in',
    UNKNOWN_USER: 'Username not found',
    BAD_PASSWORD: 'Incorrect password',
};

const AUTH_CODES: readonly AuthRejection[] = ['ALREADY_ACTIVE', 'UNKNOWN_USER', 'BAD_PASSWORD'];

export function formatAuthError(code: AuthRejection): string {
    return `ERROR: ${AUTH_REASONS[code]}`;
}

export function parseAuthReply(reply: string): AuthError | ProtocolError | null {
    if (reply === REPLY.AUTH_OK) return null;
    const code = AUTH_CODES.find(c => reply === formatAuthError(c));
    if (code) return new AuthError(code, AUTH_REASONS[code]);
    if (reply.startsWith('ERROR: ')) return new ProtocolError('MALFORMED', reply.slice('ERROR: '.length));
    return new ProtocolError('UNEXPECTED_REPLY', `Unexpected authentication reply: ${reply}`);
}

/** `<n> <header>:\n<name>\n<name>...` or the fixed empty text. */
interface ListingFormat {
    header: string;
    empty: string;
}

export const LISTINGS = {
    peers: { header: 'active peers', empty: REPLY.NO_PEERS },
    files: { header: 'file shared', empty: REPLY.NO_FILES },
    matches: { header: 'files found', empty: REPLY.NO_MATCHES },
} satisfies Record<string, ListingFormat>;

export function formatListing(format: ListingFormat, names: readonly string[]): string {
    if (names.length === 0) return format.empty;
    return `${names.length} ${format.header}:\n${names.join('\n')}`;
}

export function parseListing(format: ListingFormat, reply: string): string[] | null {
    if (reply === format.empty) return [];

    const [first, ...names] = reply.split('\n');
    const match = /^(\d+) (.+):$/.exec(first);
    if (!match || match[2] !== format.header || Number(match[1]) !== names.length) return null;
    return names;
}

export const fetchTargetSchema = z.object({
    username: z.string().min(1),
    address: z.string().min(1),
    port: z.number().int().min(1).max(65535),
});

export type FetchTarget = z.infer<typeof fetchTargetSchema>;

export function formatFetchTarget(target: FetchTarget): string {
    return JSON.stringify({ username: target.username, address: target.address, port: target.port });
}

export function parseFetchReply(reply: string): FetchTarget | null | ProtocolError {
    if (reply === REPLY.FETCH_NOT_FOUND) return null;
    let parsed: unknown;
    try {
        parsed = JSON.parse(reply);
    } catch (e) {
        return new ProtocolError('UNEXPECTED_REPLY', `Unexpected fetch reply: ${reply}`);
    }
    const result = fetchTargetSchema.safeParse(parsed);
    return result.success
        ? result.data
        : new ProtocolError('UNEXPECTED_REPLY', 'Fetch reply is missing peer fields');
}
