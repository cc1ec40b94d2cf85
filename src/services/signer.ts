import { privateKeyToAccount, toAccount, type LocalAccount, type PrivateKeyAccount } from 'viem/accounts';
import { isHex, type Address, type Hex } from 'viem';
import { pino } from 'pino';
import { ConfigurationError, SignerUnavailableError } from '../domain/errors.js';
import { config } from '../config.js';

const logger = pino({ level: config.logLevel });

/**
 * Custody handle for the facilitator's gas-paying key.
 * The key itself never leaves this object; callers get an address, signatures,
 * and a viem account whose signing closures hold the key.
 */
export class OperationalSigner {
    private held?: PrivateKeyAccount;
    private readonly delegate: LocalAccount;

    private constructor(account: PrivateKeyAccount) {
        this.held = account;
        this.delegate = toAccount({
            address: account.address,
            sign: async ({ hash }) => this.key().sign({ hash }),
            signMessage: async ({ message }) => this.key().signMessage({ message }),
            signTransaction: async (transaction, options) => this.key().signTransaction(transaction, options),
            signTypedData: async (typedData) => this.key().signTypedData(typedData),
        });
    }

    static fromPrivateKey(privateKey: string | undefined): OperationalSigner {
        if (!privateKey || !isHex(privateKey) || privateKey.length !== 66) {
            throw new ConfigurationError('OPERATOR_PRIVATE_KEY must be a 32-byte 0x-prefixed hex string');
        }
        const account = privateKeyToAccount(privateKey);
        logger.info({ address: account.address }, 'Loaded operational signer');
        return new OperationalSigner(account);
    }

    get address(): Address {
        return this.key().address;
    }

    get disposed(): boolean {
        return this.held === undefined;
    }

    async sign(digest: Hex): Promise<Hex> {
        return this.key().sign({ hash: digest });
    }

    /** Custom viem account; every signature goes through the held key, so it stops working on dispose. */
    account(): LocalAccount {
        this.key();
        return this.delegate;
    }

    private key(): PrivateKeyAccount {
        if (!this.held) throw new SignerUnavailableError();
        return this.held;
    }

    dispose(): void {
        if (this.held) {
            logger.info({ address: this.held.address }, 'Operational signer released');
            this.held = undefined;
        }
    }
}
