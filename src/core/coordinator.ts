import { EventEmitter } from 'events';
import { Credentials } from './config';
import { log, highlight } from './log';
import { PeerAddress, Registry, RegistryOptions, Session } from './registry';
import { ControlRequest, decodeRequest } from '../protocol/control';
import {
    LISTINGS,
    REPLY,
    formatAuthError,
    formatFetchTarget,
    formatListing,
} from '../protocol/replies';

export interface FileEvent {
    username: string;
    filename: string;
}

export interface RejectedRequest {
    from: PeerAddress;
    reason: string;
}

/**
 * Central authority of the mesh. `handle` takes one control datagram and returns
 * the reply datagram (or null when nothing is sent back). Every call ends with an
 * expiry sweep, so the registry is only ever touched from here, one request at a
 * time.
 *
 * Events: `session:new` / `session:refresh` / `session:expired` (Session),
 * `file:shared` / `file:removed` (FileEvent), `request:rejected` (RejectedRequest).
 */
export class Coordinator extends EventEmitter {
    public readonly registry: Registry;

    constructor(credentials: Credentials, options: RegistryOptions = {}) {
        super();
        this.registry = new Registry(credentials, options);
    }

    public handle(data: Buffer | string, from: PeerAddress): string | null {
        try {
            return this.dispatch(data, from);
        } finally {
            for (const session of this.registry.sweep()) {
                log.warn('EXPIRED', `Session of ${highlight(session.username)} evicted (no heartbeat)`);
                this.emit('session:expired', session);
            }
        }
    }

    private dispatch(data: Buffer | string, from: PeerAddress): string | null {
        const decoded = decodeRequest(data);

        if (decoded.kind === 'unknown') {
            log.debug('COORD', `Dropped message of unknown type "${decoded.type}" from ${from.address}:${from.port}`);
            return null;
        }
        if (decoded.kind === 'malformed') {
            log.warn('COORD', `Malformed request from ${from.address}:${from.port}: ${decoded.reason}`);
            this.emit('request:rejected', { from, reason: decoded.reason });
            return REPLY.MALFORMED;
        }

        const reply = this.apply(decoded.request, from);
        if (reply !== null) {
            log.debug('COORD', `${from.address}:${from.port} ${decoded.request.type} -> ${decoded.request.username}`);
        }
        return reply;
    }

    private apply(request: ControlRequest, from: PeerAddress): string | null {
        const registry = this.registry;

        switch (request.type) {
            case 'AUTH': {
                const outcome = registry.authenticate(request.username, request.password, from, request.transferPort);
                if (!outcome.ok) {
                    log.warn('AUTH', `Rejected ${highlight(request.username)}: ${outcome.code}`);
                    return formatAuthError(outcome.code);
                }
                log.success('AUTH', `${highlight(request.username)} online at ${from.address} (transfer port ${request.transferPort})`);
                this.emit('session:new', outcome.session);
                return REPLY.AUTH_OK;
            }
            case 'STATUS': {
                if (registry.heartbeat(request.username, from)) {
                    this.emit('session:refresh', this.findSession(request.username));
                }
                return null;
            }
            case 'LIST_PEERS':
                return formatListing(LISTINGS.peers, registry.listPeers(request.username));
            case 'LIST_FILES':
                return formatListing(LISTINGS.files, registry.listFiles(request.username));
            case 'SHARE': {
                registry.share(request.username, request.filename);
                this.emit('file:shared', { username: request.username, filename: request.filename });
                return REPLY.SHARE_OK;
            }
            case 'SEARCH':
                return formatListing(LISTINGS.matches, registry.search(request.username, request.filename));
            case 'REMOVE': {
                if (!registry.remove(request.username, request.filename)) return REPLY.REMOVE_FAILED;
                this.emit('file:removed', { username: request.username, filename: request.filename });
                return REPLY.REMOVE_OK;
            }
            case 'FETCH': {
                const target = registry.fetch(request.username, request.filename);
                if (!target) return REPLY.FETCH_NOT_FOUND;
                log.info('FETCH', `${request.username} -> ${target.username} (${target.address}:${target.port}) for ${request.filename}`);
                return formatFetchTarget(target);
            }
        }
    }

    private findSession(username: string): Session | undefined {
        return this.registry.getSessions().find(s => s.username === username);
    }
}
