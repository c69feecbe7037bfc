import { CONFIG, Credentials } from './config';
import { AuthRejection } from './errors';
import { FetchTarget } from '../protocol/replies';

export interface PeerAddress {
    address: string;
    port: number;
}

export interface Session {
    username: string;
    endpoint: PeerAddress;
    lastHeartbeat: number;
    transferPort: number;
}

export type AuthOutcome = { ok: true; session: Session } | { ok: false; code: AuthRejection };

export interface RegistryOptions {
    livenessWindowMs?: number;
    now?: () => number;
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Sessions and the file index. Owned by the coordinator and only mutated from
 * its sequential request handler.
 */
export class Registry {
    private sessions: Map<string, Session> = new Map();
    // filename -> sharers; a record never holds an empty set
    private files: Map<string, Set<string>> = new Map();
    private readonly livenessWindowMs: number;
    private readonly now: () => number;

    constructor(private credentials: Credentials, options: RegistryOptions = {}) {
        this.livenessWindowMs = options.livenessWindowMs ?? CONFIG.TIMING.LIVENESS_WINDOW_MS;
        this.now = options.now ?? Date.now;
    }

    public authenticate(username: string, password: string, endpoint: PeerAddress, transferPort: number): AuthOutcome {
        if (this.sessions.has(username)) return { ok: false, code: 'ALREADY_ACTIVE' };

        const secret = this.credentials.get(username);
        if (secret === undefined) return { ok: false, code: 'UNKNOWN_USER' };
        if (secret !== password) return { ok: false, code: 'BAD_PASSWORD' };

        const session: Session = { username, endpoint, lastHeartbeat: this.now(), transferPort };
        this.sessions.set(username, session);
        return { ok: true, session };
    }

    /** Returns false when there is no session to refresh. */
    public heartbeat(username: string, endpoint: PeerAddress): boolean {
        const session = this.sessions.get(username);
        if (!session) return false;
        session.lastHeartbeat = this.now();
        session.endpoint = endpoint;
        return true;
    }

    public isLive(username: string): boolean {
        return this.sessions.has(username);
    }

    public listPeers(username: string): string[] {
        return Array.from(this.sessions.keys()).filter(u => u !== username).sort(byName);
    }

    public listFiles(username: string): string[] {
        return Array.from(this.files.entries())
            .filter(([, sharers]) => sharers.has(username))
            .map(([filename]) => filename)
            .sort(byName);
    }

    public share(username: string, filename: string): void {
        let sharers = this.files.get(filename);
        if (!sharers) {
            sharers = new Set();
            this.files.set(filename, sharers);
        }
        sharers.add(username);
    }

    public search(username: string, pattern: string): string[] {
        return Array.from(this.files.entries())
            .filter(([filename, sharers]) =>
                filename.includes(pattern) && this.liveSharers(sharers, username).length > 0)
            .map(([filename]) => filename)
            .sort(byName);
    }

    public remove(username: string, filename: string): boolean {
        const sharers = this.files.get(filename);
        if (!sharers || !sharers.delete(username)) return false;
        if (sharers.size === 0) this.files.delete(filename);
        return true;
    }

    /** Picks the lexicographically first live sharer other than the caller. */
    public fetch(username: string, filename: string): FetchTarget | null {
        const sharers = this.files.get(filename);
        if (!sharers) return null;

        const [first] = this.liveSharers(sharers, username);
        const session = first === undefined ? undefined : this.sessions.get(first);
        if (!session) return null;

        return {
            username: session.username,
            address: session.endpoint.address,
            port: session.transferPort,
        };
    }

    /** Evicts sessions whose last heartbeat is older than the liveness window. */
    public sweep(): Session[] {
        const now = this.now();
        const expired: Session[] = [];
        for (const [username, session] of this.sessions.entries()) {
            if (now - session.lastHeartbeat > this.livenessWindowMs) {
                this.sessions.delete(username);
                expired.push(session);
            }
        }
        return expired;
    }

    public getSessions(): Session[] {
        return Array.from(this.sessions.values(), s => ({ ...s, endpoint: { ...s.endpoint } }));
    }

    public getFiles(): Array<{ filename: string, sharers: string[] }> {
        return Array.from(this.files.entries(), ([filename, sharers]) => ({
            filename,
            sharers: Array.from(sharers).sort(byName)
        }));
    }

    private liveSharers(sharers: Set<string>, caller: string): string[] {
        return Array.from(sharers).filter(s => s !== caller && this.isLive(s)).sort(byName);
    }
}
