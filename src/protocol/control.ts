import { z } from 'zod';

// Control channel requests. One JSON object per datagram, discriminated by `type`.

const username = z.string().min(1);
const filename = z.string().min(1);

export const authRequestSchema = z.object({
    type: z.literal('AUTH'),
    username,
    password: z.string(),
    transferPort: z.number().int().min(1).max(65535),
});

export const controlRequestSchema = z.discriminatedUnion('type', [
    authRequestSchema,
    z.object({ type: z.literal('STATUS'), username }),
    z.object({ type: z.literal('LIST_PEERS'), username }),
    z.object({ type: z.literal('LIST_FILES'), username }),
    z.object({ type: z.literal('SHARE'), username, filename }),
    // `filename` carries the search pattern; an empty pattern matches everything
    z.object({ type: z.literal('SEARCH'), username, filename: z.string() }),
    z.object({ type: z.literal('REMOVE'), username, filename }),
    z.object({ type: z.literal('FETCH'), username, filename }),
]);

export type ControlRequest = z.infer<typeof controlRequestSchema>;
export type ControlType = ControlRequest['type'];

export const CONTROL_TYPES: readonly ControlType[] = [
    'AUTH', 'STATUS', 'LIST_PEERS', 'LIST_FILES', 'SHARE', 'SEARCH', 'REMOVE', 'FETCH'
];

function isControlType(value: string): value is ControlType {
    return CONTROL_TYPES.some(t => t === value);
}

export type DecodedRequest =
    | { kind: 'request'; request: ControlRequest }
    | { kind: 'unknown'; type: string }
    | { kind: 'malformed'; reason: string };

export function decodeRequest(data: Buffer | string): DecodedRequest {
    let parsed: unknown;
    try {
        parsed = JSON.parse(data.toString());
    } catch (e) {
        return { kind: 'malformed', reason: 'not valid JSON' };
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        return { kind: 'malformed', reason: 'expected a JSON object' };
    }
    const type: unknown = Reflect.get(parsed, 'type');
    if (typeof type !== 'string') {
        return { kind: 'malformed', reason: 'missing "type"' };
    }
    if (!isControlType(type)) {
        return { kind: 'unknown', type };
    }

    const result = controlRequestSchema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        return { kind: 'malformed', reason: `${type}: ${issue.path.join('.') || 'body'} ${issue.message}` };
    }
    return { kind: 'request', request: result.data };
}

export function encodeRequest(request: ControlRequest): Buffer {
    return Buffer.from(JSON.stringify(request));
}
