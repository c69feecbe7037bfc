import * as path from 'path';
import { z } from 'zod';
import { TransferError } from '../core/errors';

// Transfer channel framing, in order:
//   requester -> sharer   {"username","filename"}
//   sharer -> requester   decimal size token
//   requester -> sharer   ACK
//   sharer -> requester   exactly <size> raw bytes
// The sharer closing without a size token means the file is not available.

export const transferRequestSchema = z.object({
    username: z.string().min(1),
    filename: z.string().min(1),
});

/** Who is asking for what, for the lifetime of one transfer connection. */
export type TransferContext = z.infer<typeof transferRequestSchema>;

const MAX_REQUEST_BYTES = 4096;

export function encodeTransferRequest(context: TransferContext): Buffer {
    return Buffer.from(JSON.stringify({ username: context.username, filename: context.filename }));
}

/**
 * `complete: false` means the bytes so far are not yet a whole JSON object and
 * more may follow.
 */
export function decodeTransferRequest(data: Buffer):
    | { complete: true; context: TransferContext | null }
    | { complete: false } {
    if (data.length > MAX_REQUEST_BYTES) return { complete: true, context: null };

    let parsed: unknown;
    try {
        parsed = JSON.parse(data.toString());
    } catch (e) {
        return { complete: false };
    }
    const result = transferRequestSchema.safeParse(parsed);
    return { complete: true, context: result.success ? result.data : null };
}

export function encodeSizeToken(size: number): Buffer {
    return Buffer.from(String(size));
}

export function parseSizeToken(data: Buffer): number {
    const text = data.toString().trim();
    const size = Number(text);
    if (!/^\d+$/.test(text) || !Number.isSafeInteger(size)) {
        throw new TransferError('BAD_SIZE', `Unparsable size token "${text.slice(0, 32)}"`);
    }
    return size;
}

/** Only bare names inside a share directory are served or written. */
export function isPlainFilename(filename: string): boolean {
    return filename !== '.'
        && filename !== '..'
        && !filename.includes('\0')
        && path.basename(filename) === filename
        && path.win32.basename(filename) === filename;
}
