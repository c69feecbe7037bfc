import { promises as fs } from 'fs';
import * as path from 'path';
import { EventEmitter } from 'events';
import { CONFIG } from './config';
import {
    AuthError,
    LocalFileError,
    MeshError,
    ProtocolError,
    Result,
    TransferError,
    describeError,
    fail,
    ok,
} from './errors';
import { log, highlight } from './log';
import { AgentState } from './state';
import { ControlClient } from '../network/control-client';
import { TransferClient } from '../network/client';
import { Heartbeat } from '../network/heartbeat';
import { TransferServer } from '../network/tcp';
import { ControlRequest } from '../protocol/control';
import {
    LISTINGS,
    REPLY,
    FetchTarget,
    parseAuthReply,
    parseFetchReply,
    parseListing,
} from '../protocol/replies';
import { isPlainFilename } from '../transfer/protocol';

export interface PeerAgentOptions {
    coordinatorHost: string;
    coordinatorPort: number;
    /** Address the transfer acceptor binds to. */
    host?: string;
    shareRoot?: string;
    heartbeatIntervalMs?: number;
    replyTimeoutMs?: number;
    connectTimeoutMs?: number;
    readTimeoutMs?: number;
    chunkSize?: number;
}

export interface FetchOutcome {
    from: FetchTarget;
    path: string;
    bytes: number;
}

type ListingFormat = (typeof LISTINGS)[keyof typeof LISTINGS];

/**
 * A participant of the mesh: control client of the coordinator and transfer
 * server for other peers. Operations resolve to Result values and never throw
 * for network or protocol failures.
 *
 * Events: 'transfer:sent', 'transfer:declined' (forwarded from the acceptor),
 * 'upload:progress' ({ requester, filename, sent, total }),
 * 'download:progress' ({ filename, received, total }),
 * 'transfer:received' (FetchOutcome), 'transfer:failed' ({ filename, error }).
 */
export class PeerAgent extends EventEmitter {
    public readonly state = new AgentState();
    private control: ControlClient;
    private server: TransferServer;
    private heartbeat: Heartbeat;
    private readonly shareRoot: string;
    private started = false;
    private stopped = false;
    private loggingIn = false;

    constructor(private options: PeerAgentOptions) {
        super();
        this.shareRoot = options.shareRoot ?? CONFIG.STORAGE.SHARE_ROOT;
        this.control = new ControlClient(options.coordinatorHost, options.coordinatorPort, options.replyTimeoutMs);
        this.heartbeat = new Heartbeat(this.control, options.heartbeatIntervalMs);
        this.server = new TransferServer({
            resolveDirectory: () => {
                const snapshot = this.state.current();
                return snapshot.authenticated ? this.shareDirectory(snapshot.username) : null;
            },
            readTimeoutMs: options.readTimeoutMs,
            chunkSize: options.chunkSize,
        });
        this.server.on('transfer:sent', (info) => this.emit('transfer:sent', info));
        this.server.on('transfer:declined', (info) => this.emit('transfer:declined', info));
        this.server.on('transfer:progress', (info) => this.emit('upload:progress', info));
    }

    /** Opens the transfer acceptor on an ephemeral port and returns it. */
    public async start(): Promise<number> {
        if (!this.started) {
            await this.server.start(this.options.host ?? CONFIG.NETWORK.HOST);
            this.started = true;
            log.info('TCP', `Accepting transfers on port ${this.server.port}`);
        }
        return this.server.port;
    }

    public get transferPort(): number {
        return this.server.port;
    }

    public get username(): string | null {
        return this.state.username;
    }

    public get isHeartbeating(): boolean {
        return this.heartbeat.running;
    }

    public shareDirectory(username: string): string {
        return path.join(this.shareRoot, username);
    }

    /**
     * Logs in at the coordinator. Only one attempt runs at a time; a call made
     * while another is in flight or a session is active fails with ALREADY_ACTIVE.
     */
    public async authenticate(
        username: string,
        password: string
    ): Promise<Result<void, AuthError | ProtocolError | LocalFileError>> {
        if (this.state.username) {
            return fail(new AuthError('ALREADY_ACTIVE', `Already authenticated as ${this.state.username}`));
        }
        if (this.loggingIn) return fail(new AuthError('ALREADY_ACTIVE', 'A login is already in progress'));

        this.loggingIn = true;
        try {
            return await this.login(username, password);
        } finally {
            this.loggingIn = false;
        }
    }

    public async listPeers(): Promise<Result<string[]>> {
        return this.listing('LIST_PEERS', LISTINGS.peers);
    }

    public async listFiles(): Promise<Result<string[]>> {
        return this.listing('LIST_FILES', LISTINGS.files);
    }

    public async search(pattern: string): Promise<Result<string[]>> {
        const username = this.requireUser();
        if (!username.ok) return username;

        const reply = await this.send({ type: 'SEARCH', username: username.value, filename: pattern });
        return reply.ok ? this.parseListingReply(LISTINGS.matches, reply.value) : reply;
    }

    /** Advertises a file that must already exist in the local share directory. */
    public async share(filename: string): Promise<Result<void>> {
        const username = this.requireUser();
        if (!username.ok) return username;

        const filePath = path.join(this.shareDirectory(username.value), filename);
        const stats = isPlainFilename(filename) ? await fs.stat(filePath).catch(() => null) : null;
        if (!stats || !stats.isFile()) {
            return fail(new LocalFileError('NOT_FOUND', `File not found: ${filename}`));
        }

        const reply = await this.send({ type: 'SHARE', username: username.value, filename });
        if (!reply.ok) return reply;
        return reply.value === REPLY.SHARE_OK ? ok(undefined) : fail(unexpected(reply.value));
    }

    /** Resolves to false when the file was not shared by this user. */
    public async remove(filename: string): Promise<Result<boolean>> {
        const username = this.requireUser();
        if (!username.ok) return username;

        const reply = await this.send({ type: 'REMOVE', username: username.value, filename });
        if (!reply.ok) return reply;
        if (reply.value === REPLY.REMOVE_OK) return ok(true);
        if (reply.value === REPLY.REMOVE_FAILED) return ok(false);
        return fail(unexpected(reply.value));
    }

    /** Asks the coordinator for a live sharer and downloads the file from it. */
    public async fetch(filename: string): Promise<Result<FetchOutcome>> {
        const username = this.requireUser();
        if (!username.ok) return username;
        if (!isPlainFilename(filename)) {
            return fail(new TransferError('NOT_FOUND', `File not found: ${filename}`));
        }

        const reply = await this.send({ type: 'FETCH', username: username.value, filename });
        if (!reply.ok) return reply;
        const target = parseFetchReply(reply.value);
        if (target instanceof ProtocolError) return fail(target);
        if (!target) return fail(new TransferError('NOT_FOUND', REPLY.FETCH_NOT_FOUND));

        const directory = this.shareDirectory(username.value);
        log.info('FETCH', `Downloading ${filename} from ${highlight(target.username)} at ${target.address}:${target.port}`);
        try {
            await fs.mkdir(directory, { recursive: true });
            const client = new TransferClient(target.address, target.port, this.options.connectTimeoutMs);
            const received = await client.download(
                { username: username.value, filename },
                path.join(directory, filename),
                {
                    readTimeoutMs: this.options.connectTimeoutMs,
                    onProgress: (done, total) => this.emit('download:progress', { filename, received: done, total }),
                }
            );
            const outcome: FetchOutcome = { from: target, path: received.path, bytes: received.bytes };
            log.success('COMPLETE', `${filename} downloaded to ${received.path} (${received.bytes} bytes)`);
            this.emit('transfer:received', outcome);
            return ok(outcome);
        } catch (err) {
            const error = err instanceof TransferError ? err : new TransferError('IO', describeError(err));
            log.error('TRANSFER', `Fetch of ${filename} failed: ${error.message}`);
            this.emit('transfer:failed', { filename, error });
            return fail(error);
        }
    }

    /** Ends the session, stops every background unit and waits for them. */
    public async shutdown(): Promise<void> {
        if (this.stopped) return;
        this.stopped = true;

        this.state.logout();
        this.heartbeat.stop();
        await this.server.stop();
        await this.control.close();
        log.info('SYSTEM', 'Peer agent stopped');
    }

    private async login(
        username: string,
        password: string
    ): Promise<Result<void, AuthError | ProtocolError | LocalFileError>> {
        const port = await this.start();

        const reply = await this.send({ type: 'AUTH', username, password, transferPort: port });
        if (!reply.ok) return reply;
        const error = parseAuthReply(reply.value);
        if (error) return fail(error);

        try {
            await fs.mkdir(this.shareDirectory(username), { recursive: true });
        } catch (err) {
            // no heartbeat is sent, so the coordinator expires the session it just created
            log.error('AUTH', `Cannot prepare share directory for ${username}: ${describeError(err)}`);
            return fail(new LocalFileError('IO', `Cannot create ${this.shareDirectory(username)}: ${describeError(err)}`));
        }

        const signal = this.state.login(username);
        this.heartbeat.start(username, signal);
        log.success('AUTH', `Authenticated as ${highlight(username)}`);
        return ok(undefined);
    }

    private async listing(type: 'LIST_PEERS' | 'LIST_FILES', format: ListingFormat): Promise<Result<string[]>> {
        const username = this.requireUser();
        if (!username.ok) return username;

        const reply = await this.send({ type, username: username.value });
        return reply.ok ? this.parseListingReply(format, reply.value) : reply;
    }

    private parseListingReply(format: ListingFormat, reply: string): Result<string[]> {
        const names = parseListing(format, reply);
        return names ? ok(names) : fail(unexpected(reply));
    }

    private async send(request: ControlRequest): Promise<Result<string, ProtocolError>> {
        try {
            return ok(await this.control.request(request));
        } catch (err) {
            return fail(err instanceof ProtocolError ? err : new ProtocolError('TIMEOUT', describeError(err)));
        }
    }

    private requireUser(): Result<string, AuthError> {
        const snapshot = this.state.current();
        return snapshot.authenticated
            ? ok(snapshot.username)
            : fail(new AuthError('NOT_AUTHENTICATED', 'Not authenticated'));
    }
}

function unexpected(reply: string): MeshError {
    return reply === REPLY.MALFORMED
        ? new ProtocolError('MALFORMED', 'Coordinator rejected the request')
        : new ProtocolError('UNEXPECTED_REPLY', `Unexpected reply: ${reply.split('\n')[0]}`);
}

