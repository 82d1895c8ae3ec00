import { TcpSocketConnectOpts } from 'net';
import { API, getApiName } from './api';
import { Connection, SendRequest, SslOptions } from './connection';
import { log } from './utils/logger';

export type SASLProvider = {
    mechanism: string;
    authenticate: (context: { sendRequest: SendRequest }) => Promise<void>;
};

type Versioned = { apiVersion: number; fallback?: Versioned };

type BrokerOptions = {
    clientId: string | null;
    options: TcpSocketConnectOpts;
    sasl: SASLProvider | null;
    ssl: SslOptions | null;
    requestTimeout: number;
};

export class Broker {
    private connection: Connection;
    public sendRequest: SendRequest;

    constructor(private options: BrokerOptions) {
        this.connection = new Connection({
            clientId: this.options.clientId,
            connection: this.options.options,
            ssl: this.options.ssl,
            requestTimeout: this.options.requestTimeout,
        });
        this.sendRequest = this.connection.sendRequest.bind(this.connection);
    }

    public async connect() {
        if (!this.connection.isConnected()) {
            await this.connection.connect();
            await this.validateApiVersions();
            await this.saslAuthenticate();
        }
        return this;
    }

    public async disconnect() {
        await this.connection.disconnect();
    }

    private async validateApiVersions() {
        const { versions } = await this.sendRequest(API.API_VERSIONS, {});

        const supported = Object.fromEntries(versions.map(({ apiKey, ...range }) => [apiKey, range] as const));
        Object.values(API).forEach((api) => {
            const range = supported[api.apiKey];
            if (!range) {
                log.warn(`Broker does not support API ${getApiName(api)}`);
                return;
            }
            let candidate: Versioned | undefined = api;
            while (candidate && (candidate.apiVersion < range.minVersion || candidate.apiVersion > range.maxVersion)) {
                candidate = candidate.fallback;
            }
            if (!candidate) {
                log.warn(
                    `Broker does not support API ${getApiName(api)} version ${api.apiVersion} (minVersion=${range.minVersion}, maxVersion=${range.maxVersion})`,
                );
            }
        });

        this.connection.setVersions(supported);
    }

    private async saslAuthenticate() {
        if (!this.options.sasl) {
            return;
        }
        await this.sendRequest(API.SASL_HANDSHAKE, { mechanism: this.options.sasl.mechanism });
        await this.options.sasl.authenticate({ sendRequest: this.sendRequest });
    }
}
