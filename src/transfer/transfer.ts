import { createReadStream, promises as fs } from 'fs';
import { Socket } from 'net';
import * as path from 'path';
import { CONFIG } from '../core/config';
import { TransferError, describeError } from '../core/errors';
import { SocketReader } from '../network/reader';
import {
    TransferContext,
    decodeTransferRequest,
    encodeSizeToken,
    encodeTransferRequest,
    isPlainFilename,
    parseSizeToken,
} from './protocol';

export interface ServeOptions {
    /** Directory of the currently authenticated user, or null when logged out. */
    resolveDirectory: () => string | null;
    readTimeoutMs?: number;
    chunkSize?: number;
    onProgress?: (context: TransferContext, sent: number, total: number) => void;
}

export type ServeOutcome =
    | { status: 'sent'; context: TransferContext; bytes: number; chunks: number }
    | { status: 'declined'; context: TransferContext | null; reason: string };

export interface ReceiveOptions {
    readTimeoutMs?: number;
    onProgress?: (received: number, total: number) => void;
}

export interface ReceiveOutcome {
    path: string;
    bytes: number;
}

/**
 * Sharer side of one transfer connection. Resolves once the file has been
 * written out or the request was declined; the caller closes the socket.
 */
export async function serveTransfer(socket: Socket, options: ServeOptions): Promise<ServeOutcome> {
    const timeout = options.readTimeoutMs ?? CONFIG.TIMING.HANDLER_READ_TIMEOUT_MS;
    const chunkSize = options.chunkSize ?? CONFIG.TRANSFER.CHUNK_SIZE;
    const reader = new SocketReader(socket);

    const context = await readRequest(reader, timeout);
    if (!context) return { status: 'declined', context: null, reason: 'empty or invalid request' };

    const directory = options.resolveDirectory();
    if (!directory) return { status: 'declined', context, reason: 'no user is authenticated here' };
    if (!isPlainFilename(context.filename)) return { status: 'declined', context, reason: 'invalid filename' };

    const filePath = path.join(directory, context.filename);
    const stats = await fs.stat(filePath).catch(() => null);
    if (!stats || !stats.isFile()) return { status: 'declined', context, reason: `${filePath} not found` };

    await write(socket, encodeSizeToken(stats.size));

    const ack = await reader.readAtLeast(CONFIG.TRANSFER.ACK_TOKEN.length, timeout);
    if (!ack || ack.toString() !== CONFIG.TRANSFER.ACK_TOKEN) {
        return { status: 'declined', context, reason: 'no acknowledgment from requester' };
    }

    let bytes = 0;
    let chunks = 0;
    const stream = createReadStream(filePath, { highWaterMark: chunkSize });
    try {
        for await (const data of stream) {
            const chunk: Buffer = Buffer.isBuffer(data) ? data : Buffer.from(data);
            await write(socket, chunk);
            bytes += chunk.length;
            chunks++;
            options.onProgress?.(context, bytes, stats.size);
        }
    } finally {
        stream.destroy();
    }

    return { status: 'sent', context, bytes, chunks };
}

/**
 * Requester side: asks for `context.filename`, acknowledges the size and stores
 * exactly that many bytes at `outputPath`. The data goes to a `.part` file that
 * is renamed into place only when complete.
 */
export async function receiveTransfer(
    socket: Socket,
    context: TransferContext,
    outputPath: string,
    options: ReceiveOptions = {}
): Promise<ReceiveOutcome> {
    const timeout = options.readTimeoutMs ?? CONFIG.TIMING.CONNECT_TIMEOUT_MS;
    const reader = new SocketReader(socket);

    await write(socket, encodeTransferRequest(context));

    const sizeToken = await reader.read(timeout);
    if (!sizeToken) {
        throw new TransferError('NOT_FOUND', `Peer has no file named ${context.filename}`);
    }
    const size = parseSizeToken(sizeToken);
    await write(socket, Buffer.from(CONFIG.TRANSFER.ACK_TOKEN));

    const partPath = `${outputPath}.part`;
    const handle = await fs.open(partPath, 'w');
    let received = 0;
    try {
        while (received < size) {
            const chunk = await reader.read(timeout);
            if (!chunk) {
                throw new TransferError('TRUNCATED', `Connection closed after ${received} of ${size} bytes`);
            }
            const piece = chunk.length > size - received ? chunk.subarray(0, size - received) : chunk;
            await handle.write(piece);
            received += piece.length;
            options.onProgress?.(received, size);
        }
    } catch (err) {
        await handle.close();
        await fs.rm(partPath, { force: true });
        throw err instanceof TransferError ? err : new TransferError('IO', describeError(err));
    }

    await handle.close();
    await fs.rename(partPath, outputPath);
    return { path: outputPath, bytes: received };
}

async function readRequest(reader: SocketReader, timeoutMs: number): Promise<TransferContext | null> {
    let collected = Buffer.alloc(0);
    for (;;) {
        const chunk = await reader.read(timeoutMs);
        if (!chunk) return null;
        collected = Buffer.concat([collected, chunk]);

        const decoded = decodeTransferRequest(collected);
        if (decoded.complete) return decoded.context;
    }
}

function write(socket: Socket, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
        if (socket.destroyed) {
            reject(new TransferError('IO', 'Connection already closed'));
            return;
        }
        const onClose = () => reject(new TransferError('IO', 'Connection closed mid-transfer'));
        socket.once('close', onClose);
        socket.write(data, (err) => {
            socket.off('close', onClose);
            if (err) reject(new TransferError('IO', err.message));
            else resolve();
        });
    });
}
