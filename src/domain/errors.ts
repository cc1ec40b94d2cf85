/** RPC transport fault: the chain could not be reached or did not answer in time. */
export class ChainUnavailableError extends Error {
    constructor(readonly network: string, options?: { cause?: unknown }) {
        super(`Chain RPC unavailable for ${network}`, options);
        this.name = 'ChainUnavailableError';
    }
}

/** The node refused the transfer before broadcast (execution would revert). */
export class TransactionRejectedError extends Error {
    constructor(readonly network: string, reason: string, options?: { cause?: unknown }) {
        super(`Transfer rejected on ${network}: ${reason}`, options);
        this.name = 'TransactionRejectedError';
    }
}

export class SignerUnavailableError extends Error {
    constructor() {
        super('Operational signer is not available');
        this.name = 'SignerUnavailableError';
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
