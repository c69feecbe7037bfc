import { createSocket, Socket } from 'dgram';
import { CONFIG } from '../core/config';
import { ProtocolError } from '../core/errors';
import { log } from '../core/log';
import { ControlRequest, encodeRequest } from '../protocol/control';

interface Pending {
    resolve: (reply: string) => void;
    reject: (err: Error) => void;
    timer: NodeJS.Timeout;
}

/**
 * Peer side of the control channel. Replies carry no request id, so requests
 * are queued and only one is ever outstanding. A datagram arriving while nothing
 * is pending is discarded. A reply that arrives after its request timed out, once
 * the next request is already pending, is taken as that request's reply.
 */
export class ControlClient {
    private socket: Socket;
    private pending: Pending | null = null;
    private queue: Promise<unknown> = Promise.resolve();
    private closed = false;

    constructor(
        private coordinatorHost: string,
        private coordinatorPort: number,
        private replyTimeoutMs: number = CONFIG.TIMING.CONTROL_REPLY_TIMEOUT_MS
    ) {
        this.socket = createSocket('udp4');
        this.socket.on('message', (msg) => this.handleReply(msg));
        this.socket.on('error', (err) => log.error('CONTROL', `Socket error: ${err.message}`));
    }

    /** Sends a request and waits for its single reply datagram. */
    public async request(message: ControlRequest): Promise<string> {
        const next = this.queue.then(() => this.exchange(message));
        this.queue = next.catch(() => undefined);
        return next;
    }

    /** Fire-and-forget datagram (heartbeats). */
    public notify(message: ControlRequest): void {
        if (this.closed) return;
        this.socket.send(encodeRequest(message), this.coordinatorPort, this.coordinatorHost, (err) => {
            if (err) log.warn('CONTROL', `${message.type} not sent: ${err.message}`);
        });
    }

    public async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        if (this.pending) {
            clearTimeout(this.pending.timer);
            this.pending.reject(new ProtocolError('TIMEOUT', 'Control channel closed'));
            this.pending = null;
        }
        return new Promise((resolve) => this.socket.close(() => resolve()));
    }

    private exchange(message: ControlRequest): Promise<string> {
        return new Promise((resolve, reject) => {
            if (this.closed) {
                reject(new ProtocolError('TIMEOUT', 'Control channel closed'));
                return;
            }

            const timer = setTimeout(() => {
                this.pending = null;
                reject(new ProtocolError('TIMEOUT', `Coordinator did not answer ${message.type} within ${this.replyTimeoutMs}ms`));
            }, this.replyTimeoutMs);
            this.pending = { resolve, reject, timer };

            this.socket.send(encodeRequest(message), this.coordinatorPort, this.coordinatorHost, (err) => {
                if (err && this.pending?.timer === timer) {
                    clearTimeout(timer);
                    this.pending = null;
                    reject(new ProtocolError('TIMEOUT', `${message.type} not sent: ${err.message}`));
                }
            });
        });
    }

    private handleReply(msg: Buffer): void {
        const pending = this.pending;
        if (!pending) {
            log.debug('CONTROL', 'Discarded reply with no pending request');
            return;
        }
        this.pending = null;
        clearTimeout(pending.timer);
        pending.resolve(msg.toString());
    }
}
