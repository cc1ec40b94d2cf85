import { z } from 'zod';

export const ErrorCodes = {
    PARSE_ERROR: -32700,
    INVALID_REQUEST: -32600,
    METHOD_NOT_FOUND: -32601,
    INVALID_PARAMS: -32602,
    INTERNAL_ERROR: -32603,
    CHAIN_UNAVAILABLE: 1002,
    TERMS_MISMATCH: 2001,
    INVALID_STATE: 2002,
} as const;

export type EnvelopeId = string | number;

export const EnvelopeRequestSchema = z.object({
    id: z.union([z.string().min(1), z.number()]),
    method: z.string().min(1),
    params: z.unknown().optional(),
});

export type EnvelopeRequest = z.infer<typeof EnvelopeRequestSchema>;

export interface EnvelopeError {
    code: number;
    message: string;
    data?: unknown;
}

export interface EnvelopeSuccess<T = unknown> {
    id: EnvelopeId;
    result: T;
}

export interface EnvelopeFailure {
    id: EnvelopeId | null;
    error: EnvelopeError;
}

/** Unsolicited message; the id is fresh, not an echo. */
export interface EnvelopeNotification<P = unknown> {
    id: string;
    method: string;
    params: P;
}

export type EnvelopeResponse<T = unknown> = EnvelopeSuccess<T> | EnvelopeFailure;

export function ok<T>(id: EnvelopeId, result: T): EnvelopeSuccess<T> {
    return { id, result };
}

export function fail(id: EnvelopeId | null, code: number, message: string, data?: unknown): EnvelopeFailure {
    return data === undefined ? { id, error: { code, message } } : { id, error: { code, message, data } };
}

export type ParsedFrame =
    | { ok: true; request: EnvelopeRequest }
    | { ok: false; response: EnvelopeFailure };

/** Decodes one text frame into a request envelope, or the error to answer with. */
export function parseFrame(text: string): ParsedFrame {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch {
        return { ok: false, response: fail(null, ErrorCodes.PARSE_ERROR, 'Parse error') };
    }

    const parsed = EnvelopeRequestSchema.safeParse(raw);
    if (!parsed.success) {
        return {
            ok: false,
            response: fail(recoverId(raw), ErrorCodes.INVALID_REQUEST, 'Invalid request', parsed.error.flatten()),
        };
    }
    return { ok: true, request: parsed.data };
}

function recoverId(raw: unknown): EnvelopeId | null {
    if (typeof raw === 'object' && raw !== null && 'id' in raw) {
        const { id } = raw;
        if (typeof id === 'string' || typeof id === 'number') return id;
    }
    return null;
}
