import { z } from 'zod';

/**
 * Typed-array check by tag, since the array may come from another realm.
 */
const isInt32Array = (value: unknown): value is Int32Array =>
    ArrayBuffer.isView(value) && Object.prototype.toString.call(value) === '[object Int32Array]';

export const BRIDGE_OPERATIONS = [
    'execTask',
    'execTaskAsync',
    'broadcastEvent',
    'enqueueTask',
    'triggerEvent',
] as const;

export type BridgeOperation = (typeof BRIDGE_OPERATIONS)[number];

/**
 * A call posted from another thread. When `flag` is present the caller is
 * blocked in `Atomics.wait` on index 0 until the home thread stores 1.
 */
export const bridgeRequestSchema = z.object({
    kind: z.literal('request'),
    id: z.string().min(1),
    operation: z.enum(BRIDGE_OPERATIONS),
    target: z.string().min(1),
    source: z.string().min(1),
    kwargs: z.record(z.unknown()).default({}),
    asynchronous: z.boolean().optional(),
    flag: z.custom<Int32Array>(isInt32Array, { message: 'Expected an Int32Array flag' }).optional(),
});

export type BridgeRequest = z.input<typeof bridgeRequestSchema>;
export type ParsedBridgeRequest = z.output<typeof bridgeRequestSchema>;

export const serializedErrorSchema = z.object({
    name: z.string(),
    message: z.string(),
    code: z.string().optional(),
    stack: z.string().optional(),
});

export type SerializedError = z.infer<typeof serializedErrorSchema>;

export const bridgeResponseSchema = z.discriminatedUnion('ok', [
    z.object({ kind: z.literal('response'), id: z.string(), ok: z.literal(true), value: z.unknown() }),
    z.object({ kind: z.literal('response'), id: z.string(), ok: z.literal(false), error: serializedErrorSchema }),
]);

export type BridgeResponse = z.infer<typeof bridgeResponseSchema>;

export function serializeError(error: unknown): SerializedError {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        return { name: error.name, message: error.message, code, stack: error.stack };
    }
    return { name: 'Error', message: String(error) };
}
