import { createSocket, RemoteInfo, Socket } from 'dgram';
import { AddressInfo } from 'net';
import { Coordinator } from '../core/coordinator';
import { describeError } from '../core/errors';
import { log } from '../core/log';
import { REPLY } from '../protocol/replies';

/**
 * UDP front of the coordinator. Datagrams are handled synchronously inside the
 * 'message' callback, so one request is fully processed before the next.
 */
export class ControlServer {
    private socket: Socket;

    constructor(private coordinator: Coordinator, private host: string, private port: number) {
        this.socket = createSocket('udp4');
    }

    public async start(): Promise<number> {
        return new Promise((resolve, reject) => {
            this.socket.once('error', reject);
            this.socket.bind(this.port, this.host, () => {
                this.socket.off('error', reject);
                this.socket.on('error', (err) => log.error('CONTROL', `Socket error: ${err.message}`));
                this.socket.on('message', this.handleMessage.bind(this));

                const bound = this.address();
                log.success('CONTROL', `Coordinator listening on udp://${bound.address}:${bound.port}`);
                resolve(bound.port);
            });
        });
    }

    public address(): AddressInfo {
        return this.socket.address();
    }

    public async stop(): Promise<void> {
        return new Promise((resolve) => this.socket.close(() => resolve()));
    }

    private handleMessage(msg: Buffer, rinfo: RemoteInfo): void {
        const from = { address: rinfo.address, port: rinfo.port };
        let reply: string | null;
        try {
            reply = this.coordinator.handle(msg, from);
        } catch (err) {
            log.error('CONTROL', `Request from ${rinfo.address}:${rinfo.port} failed: ${describeError(err)}`);
            reply = REPLY.MALFORMED;
        }

        if (reply === null) return;
        this.socket.send(reply, rinfo.port, rinfo.address, (err) => {
            if (err) log.error('CONTROL', `Reply to ${rinfo.address}:${rinfo.port} lost: ${err.message}`);
        });
    }
}
