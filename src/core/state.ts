import { EventEmitter } from 'events';

export type AuthSnapshot =
    | { authenticated: false }
    | { authenticated: true; username: string; signal: AbortSignal };

/**
 * The agent's "who is logged in" cell. Written only by the command unit via
 * `login`/`logout`; background units read whole snapshots, so a reader never
 * sees a username from one session paired with the flag of another. Each
 * session gets its own AbortSignal, aborted on logout.
 *
 * Emits 'login' (username) and 'logout' (username).
 */
export class AgentState extends EventEmitter {
    private snapshot: AuthSnapshot = { authenticated: false };
    private controller: AbortController | null = null;

    public current(): AuthSnapshot {
        return this.snapshot;
    }

    public get username(): string | null {
        return this.snapshot.authenticated ? this.snapshot.username : null;
    }

    public login(username: string): AbortSignal {
        if (this.snapshot.authenticated) {
            throw new Error(`Already authenticated as ${this.snapshot.username}`);
        }
        this.controller = new AbortController();
        this.snapshot = { authenticated: true, username, signal: this.controller.signal };
        this.emit('login', username);
        return this.controller.signal;
    }

    public logout(): void {
        const previous = this.snapshot;
        if (!previous.authenticated) return;

        this.snapshot = { authenticated: false };
        this.controller?.abort();
        this.controller = null;
        this.emit('logout', previous.username);
    }
}
