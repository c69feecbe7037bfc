import { createServer, Server, Socket } from 'net';
import { EventEmitter } from 'events';
import { describeError } from '../core/errors';
import { log, highlight } from '../core/log';
import { ServeOptions, serveTransfer } from '../transfer/transfer';

/**
 * Inbound acceptor of a peer. Every accepted connection gets its own transfer
 * handler; the acceptor never waits on one. Handlers are tracked so `stop` can
 * tear them down and join them.
 *
 * Emits 'transfer:progress' ({ requester, filename, sent, total }) per chunk,
 * then 'transfer:sent' ({ requester, filename, bytes, chunks }) or
 * 'transfer:declined' ({ requester, filename, reason }).
 */
export class TransferServer extends EventEmitter {
    private server: Server;
    private handlers: Map<Socket, Promise<void>> = new Map();

    constructor(private options: ServeOptions) {
        super();
        this.server = createServer(this.handleConnection.bind(this));
        this.server.on('error', (err) => log.error('TCP', `Acceptor error: ${err.message}`));
    }

    public async start(host: string, port = 0): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(port, host, () => {
                this.server.off('error', reject);
                resolve(this.port);
            });
        });
    }

    public get port(): number {
        const address = this.server.address();
        return address && typeof address === 'object' ? address.port : 0;
    }

    public async stop(): Promise<void> {
        const closed = new Promise<void>((resolve) => this.server.close(() => resolve()));
        for (const socket of this.handlers.keys()) socket.destroy();
        await Promise.all(this.handlers.values());
        await closed;
    }

    private handleConnection(socket: Socket): void {
        const remote = `${socket.remoteAddress?.replace('::ffff:', '') ?? 'unknown'}:${socket.remotePort ?? 0}`;
        log.debug('TCP', `Incoming transfer connection from ${remote}`);
        socket.on('error', (err) => log.debug('TCP', `${remote}: ${err.message}`));

        const handler = this.runHandler(socket, remote).finally(() => this.handlers.delete(socket));
        this.handlers.set(socket, handler);
    }

    private async runHandler(socket: Socket, remote: string): Promise<void> {
        try {
            const outcome = await serveTransfer(socket, {
                ...this.options,
                onProgress: (context, sent, total) => {
                    this.options.onProgress?.(context, sent, total);
                    this.emit('transfer:progress', { requester: context.username, filename: context.filename, sent, total });
                },
            });
            if (outcome.status === 'declined') {
                log.warn('TRANSFER', `Declined request from ${outcome.context?.username ?? remote}: ${outcome.reason}`);
                this.emit('transfer:declined', {
                    requester: outcome.context?.username ?? null,
                    filename: outcome.context?.filename ?? null,
                    reason: outcome.reason,
                });
                socket.destroy();
                return;
            }

            const { context, bytes, chunks } = outcome;
            log.success('TRANSFER', `Sent ${context.filename} (${bytes} bytes) to ${highlight(context.username)}`);
            this.emit('transfer:sent', { requester: context.username, filename: context.filename, bytes, chunks });
            socket.end();
        } catch (err) {
            log.error('TRANSFER', `Transfer with ${remote} aborted: ${describeError(err)}`);
            socket.destroy();
        }
    }
}
