import { TcpSocketConnectOpts } from 'net';
import { API } from './api';
import { Metadata } from './api/metadata';
import { Broker, SASLProvider } from './broker';
import { SendRequest, SslOptions } from './connection';
import { ConnectionError } from './utils/error';
import { log } from './utils/logger';
import { createTracer } from './utils/tracer';

const trace = createTracer('Cluster');

export type ClusterOptions = {
    clientId: string | null;
    bootstrapServers: TcpSocketConnectOpts[];
    sasl: SASLProvider | null;
    ssl: SslOptions | null;
    requestTimeout: number;
};

export class Cluster {
    private seedBroker: Broker | undefined;
    private brokerById: Record<number, Broker> = {};
    private brokerMetadata: Record<number, Metadata['brokers'][number]> = {};

    constructor(private options: ClusterOptions) {}

    public async connect() {
        this.seedBroker = await this.findSeedBroker();
        this.brokerById = {};
        return this;
    }

    public async disconnect() {
        await Promise.all([
            this.seedBroker?.disconnect(),
            ...Object.values(this.brokerById).map((broker) => broker.disconnect()),
        ]);
        this.seedBroker = undefined;
        this.brokerById = {};
    }

    public sendRequest: SendRequest = async (api, body) => {
        if (!this.seedBroker) throw new ConnectionError('Cluster is not connected');
        return this.seedBroker.sendRequest(api, body);
    };

    public sendRequestToNode =
        (nodeId: number): SendRequest =>
        async (api, body) => {
            this.brokerById[nodeId] ??= await this.acquireBroker(nodeId);
            return this.brokerById[nodeId].sendRequest(api, body);
        };

    @trace((nodeId: number) => ({ message: `Broker ${nodeId}`, nodeId }))
    public async acquireBroker(nodeId: number) {
        if (!(nodeId in this.brokerMetadata)) await this.refreshBrokerMetadata();
        if (!(nodeId in this.brokerMetadata)) throw new ConnectionError(`Broker ${nodeId} is not available`);

        const { host, port } = this.brokerMetadata[nodeId];
        const broker = new Broker({
            clientId: this.options.clientId,
            sasl: this.options.sasl,
            ssl: this.options.ssl,
            requestTimeout: this.options.requestTimeout,
            options: { host, port },
        });
        try {
            await broker.connect();
        } catch (error) {
            await broker.disconnect();
            throw error;
        }
        return broker;
    }

    private async findSeedBroker() {
        const randomizedBrokers = [...this.options.bootstrapServers].sort(() => Math.random() - 0.5);
        let lastError: unknown;
        for (const options of randomizedBrokers) {
            const broker = new Broker({
                clientId: this.options.clientId,
                sasl: this.options.sasl,
                ssl: this.options.ssl,
                requestTimeout: this.options.requestTimeout,
                options,
            });
            try {
                await broker.connect();
                return broker;
            } catch (error) {
                lastError = error;
                log.debug(`Failed to connect to seed broker ${options.host}:${options.port}`, {
                    reason: error instanceof Error ? error.message : error,
                });
                await broker.disconnect();
            }
        }
        const reason = lastError instanceof Error ? lastError.message : lastError;
        throw new ConnectionError(`No seed brokers found${reason === undefined ? '' : ` (last error: ${reason})`}`);
    }

    private async refreshBrokerMetadata() {
        const metadata = await this.sendRequest(API.METADATA, { topics: [] });
        this.brokerMetadata = Object.fromEntries(metadata.brokers.map((broker) => [broker.nodeId, broker] as const));
    }
}
