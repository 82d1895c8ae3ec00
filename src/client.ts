import { TcpSocketConnectOpts } from 'net';
import { Admin } from './admin';
import { SASLProvider } from './broker';
import { Cluster } from './cluster';
import { SslOptions } from './connection';

export type ClientOptions = {
    clientId?: string | null;
    bootstrapServers: TcpSocketConnectOpts[];
    sasl?: SASLProvider | null;
    ssl?: SslOptions | null;
    requestTimeout?: number;
};

/** Time the controller gets for a reassignment, leaving the socket deadline room to receive its answer */
export const getControllerTimeout = (requestTimeout: number) =>
    Math.max(requestTimeout - 5_000, Math.floor(requestTimeout / 2));

export class Client {
    private options: Required<ClientOptions>;

    constructor(options: ClientOptions) {
        this.options = {
            ...options,
            clientId: options.clientId ?? null,
            sasl: options.sasl ?? null,
            ssl: options.ssl ?? null,
            requestTimeout: options.requestTimeout ?? 60_000,
        };
    }

    public createAdmin() {
        return new Admin(this.createCluster(), {
            timeoutMs: getControllerTimeout(this.options.requestTimeout),
        });
    }

    public createCluster() {
        return new Cluster({
            clientId: this.options.clientId,
            bootstrapServers: this.options.bootstrapServers,
            sasl: this.options.sasl,
            ssl: this.options.ssl,
            requestTimeout: this.options.requestTimeout,
        });
    }
}

export const createKafkaClient = (options: ClientOptions) => new Client(options);
