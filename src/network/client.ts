import { Socket } from 'net';
import { CONFIG } from '../core/config';
import { TransferError } from '../core/errors';
import { log } from '../core/log';
import { TransferContext } from '../transfer/protocol';
import { ReceiveOptions, ReceiveOutcome, receiveTransfer } from '../transfer/transfer';

/** Outbound transfer connection to one sharing peer. */
export class TransferClient {
    private socket: Socket;

    constructor(
        private peerIp: string,
        private peerPort: number,
        private connectTimeoutMs: number = CONFIG.TIMING.CONNECT_TIMEOUT_MS
    ) {
        this.socket = new Socket();
    }

    public async connect(): Promise<void> {
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => {
                this.socket.destroy();
                reject(new TransferError('CONNECT_TIMEOUT', `Timed out connecting to ${this.peerIp}:${this.peerPort}`));
            }, this.connectTimeoutMs);

            const onError = (err: NodeJS.ErrnoException) => {
                clearTimeout(timer);
                reject(err.code === 'ECONNREFUSED'
                    ? new TransferError('CONNECTION_REFUSED', `Connection refused by ${this.peerIp}:${this.peerPort}`)
                    : new TransferError('IO', err.message));
            };
            this.socket.once('error', onError);

            this.socket.connect(this.peerPort, this.peerIp, () => {
                clearTimeout(timer);
                this.socket.off('error', onError);
                this.socket.on('error', (err) => log.debug('TCP', `${this.peerIp}:${this.peerPort}: ${err.message}`));
                resolve();
            });
        });
    }

    /** Connects, downloads one file and closes the connection whatever happens. */
    public async download(context: TransferContext, outputPath: string, options?: ReceiveOptions): Promise<ReceiveOutcome> {
        try {
            await this.connect();
            return await receiveTransfer(this.socket, context, outputPath, options);
        } finally {
            this.socket.destroy();
        }
    }
}
