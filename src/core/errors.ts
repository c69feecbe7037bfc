/** Reasons the coordinator gives for refusing AUTH. */
export type AuthRejection = 'ALREADY_ACTIVE' | 'UNKNOWN_USER' | 'BAD_PASSWORD';
export type AuthErrorCode = AuthRejection | 'NOT_AUTHENTICATED';
export type ProtocolErrorCode = 'MALFORMED' | 'TIMEOUT' | 'UNEXPECTED_REPLY';
export type TransferErrorCode =
    | 'NOT_FOUND'
    | 'CONNECT_TIMEOUT'
    | 'CONNECTION_REFUSED'
    | 'READ_TIMEOUT'
    | 'TRUNCATED'
    | 'BAD_SIZE'
    | 'IO';
export type ConfigErrorCode = 'MISSING_CREDENTIALS' | 'INVALID_CREDENTIALS' | 'INVALID_ARGUMENT';

export abstract class MeshError<C extends string = string> extends Error {
    constructor(public readonly code: C, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Rejected authentication. Reported to the caller only. */
export class AuthError extends MeshError<AuthErrorCode> { }

/** Bad or missing control traffic. Never fatal. */
export class ProtocolError extends MeshError<ProtocolErrorCode> { }

/** Aborts one transfer; the rest of the agent keeps running. */
export class TransferError extends MeshError<TransferErrorCode> { }

/** A local share-directory problem; nothing was sent to the coordinator or a peer. */
export class LocalFileError extends MeshError<'NOT_FOUND' | 'IO'> { }

/** Fatal, startup only. */
export class ConfigError extends MeshError<ConfigErrorCode> { }

export type Result<T, E extends Error = MeshError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const fail = <E extends Error>(error: E): { ok: false; error: E } => ({ ok: false, error });

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
