import { Socket } from 'net';
import { TransferError } from '../core/errors';

interface Waiter {
    resolve: (chunk: Buffer | null) => void;
    reject: (err: Error) => void;
    timer?: NodeJS.Timeout;
}

/**
 * Pull-style reads over a socket. `read` resolves with whatever bytes have
 * arrived (or null once the peer has closed), so a lockstep protocol can wait
 * for each step in turn.
 */
export class SocketReader {
    private buffered: Buffer[] = [];
    private ended = false;
    private failure: Error | null = null;
    private waiter: Waiter | null = null;

    constructor(private socket: Socket) {
        socket.on('data', (chunk: Buffer) => {
            this.buffered.push(chunk);
            this.flush();
        });
        socket.on('end', () => {
            this.ended = true;
            this.flush();
        });
        socket.on('close', () => {
            this.ended = true;
            this.flush();
        });
        socket.on('error', (err) => {
            this.failure = err;
            this.flush();
        });
    }

    public read(timeoutMs?: number): Promise<Buffer | null> {
        if (this.waiter) return Promise.reject(new Error('Concurrent read on the same socket'));

        return new Promise((resolve, reject) => {
            const waiter: Waiter = { resolve, reject };
            if (timeoutMs !== undefined) {
                waiter.timer = setTimeout(() => {
                    this.waiter = null;
                    reject(new TransferError('READ_TIMEOUT', `No data within ${timeoutMs}ms`));
                }, timeoutMs);
            }
            this.waiter = waiter;
            this.flush();
        });
    }

    /** Reads until at least `length` bytes are buffered; returns them all. */
    public async readAtLeast(length: number, timeoutMs?: number): Promise<Buffer | null> {
        let collected = Buffer.alloc(0);
        while (collected.length < length) {
            const chunk = await this.read(timeoutMs);
            if (!chunk) return collected.length > 0 ? collected : null;
            collected = Buffer.concat([collected, chunk]);
        }
        return collected;
    }

    private flush(): void {
        const waiter = this.waiter;
        if (!waiter) return;

        if (this.buffered.length > 0) {
            const chunk = this.buffered.length === 1 ? this.buffered[0] : Buffer.concat(this.buffered);
            this.buffered = [];
            this.settle(waiter);
            waiter.resolve(chunk);
        } else if (this.failure) {
            this.settle(waiter);
            waiter.reject(this.failure);
        } else if (this.ended) {
            this.settle(waiter);
            waiter.resolve(null);
        }
    }

    private settle(waiter: Waiter): void {
        if (waiter.timer) clearTimeout(waiter.timer);
        this.waiter = null;
    }
}
