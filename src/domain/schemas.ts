import { z } from 'zod';
import { isAddress, type Address, type Hex } from 'viem';

const address = z.custom<Address>(
    (value) => typeof value === 'string' && isAddress(value, { strict: false }),
    { message: 'Invalid EVM address' }
);

const bytes32 = z.custom<Hex>(
    (value) => typeof value === 'string' && /^0x[0-9a-fA-F]{64}$/.test(value),
    { message: 'Expected 32-byte hex' }
);

const signature = z.custom<Hex>(
    (value) => typeof value === 'string' && /^0x[0-9a-fA-F]{130}$/.test(value),
    { message: 'Expected 65-byte hex signature' }
);

/** Integer amounts and timestamps travel as decimal strings; numbers are normalised. */
export const UintSchema = z
    .union([z.string().regex(/^\d+$/, 'Expected an unsigned integer'), z.number().int().nonnegative()])
    .transform((value) => String(value));

export const AuthorizationSchema = z.object({
    from: address,
    to: address,
    value: UintSchema,
    validAfter: UintSchema,
    validBefore: UintSchema,
    nonce: bytes32,
});

export const PaymentPayloadSchema = z.object({
    x402Version: z.number().int().positive().default(1),
    scheme: z.string().min(1),
    network: z.string().min(1),
    payload: z.object({
        signature,
        authorization: AuthorizationSchema,
    }),
});

export const PaymentRequirementsSchema = z.object({
    scheme: z.string().min(1),
    network: z.string().min(1),
    maxAmountRequired: UintSchema,
    resource: z.string().min(1),
    description: z.string().optional(),
    mimeType: z.string().optional(),
    payTo: address,
    maxTimeoutSeconds: z.number().int().positive(),
    asset: address,
    extra: z
        .object({
            name: z.string().optional(),
            version: z.string().optional(),
        })
        .passthrough()
        .optional(),
});

export const VerifyRequestSchema = z.object({
    x402Version: z.number().int().positive().default(1),
    paymentPayload: PaymentPayloadSchema,
    paymentRequirements: PaymentRequirementsSchema,
});

export const SettleRequestSchema = VerifyRequestSchema;
