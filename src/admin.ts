import { API, API_ERROR } from './api';
import { SendRequest } from './connection';
import { BrokerInfo, ClusterGateway, PartitionInfo, Reassignment } from './types';
import { KafkaApiError } from './utils/error';
import { log } from './utils/logger';

export type AdminCluster = {
    connect: () => Promise<unknown>;
    disconnect: () => Promise<void>;
    sendRequest: SendRequest;
    sendRequestToNode: (nodeId: number) => SendRequest;
};

export type AdminOptions = {
    /** Time the controller may spend applying a reassignment request */
    timeoutMs?: number;
};

/**
 * Cluster gateway backed by the Kafka protocol.
 *
 * Brokers are returned sorted by node id, so the rack order derived from them is the same on every run no matter in
 * which order the cluster reports its brokers.
 */
export class Admin implements ClusterGateway {
    constructor(
        private cluster: AdminCluster,
        private options: AdminOptions = {},
    ) {}

    public async connect() {
        await this.cluster.connect();
        return this;
    }

    public async disconnect() {
        await this.cluster.disconnect();
    }

    public async describeBrokers(): Promise<BrokerInfo[]> {
        const { brokers } = await this.cluster.sendRequest(API.METADATA, { topics: [] });
        if (brokers.length > 1 && brokers.every(({ rack }) => !rack)) {
            log.warn('No broker reports a rack, replicas will not be spread across racks', {
                brokers: brokers.map(({ nodeId }) => nodeId),
            });
        }
        return brokers.map(({ nodeId, rack }) => ({ nodeId, rack })).sort((a, b) => a.nodeId - b.nodeId);
    }

    public async describePartitions(topic: string): Promise<PartitionInfo[]> {
        const { topics } = await this.cluster.sendRequest(API.METADATA, {
            topics: [{ id: null, name: topic }],
            allowTopicAutoCreation: false,
            includeTopicAuthorizedOperations: false,
        });

        const metadata = topics.find(({ name }) => name === topic);
        if (!metadata) {
            throw new KafkaApiError(API_ERROR.UNKNOWN_TOPIC_OR_PARTITION, topic, topics);
        }
        return metadata.partitions
            .map(({ partitionIndex, replicaNodes }) => ({ partition: partitionIndex, replicas: replicaNodes }))
            .sort((a, b) => a.partition - b.partition);
    }

    public async alterPartitionReassignments(reassignment: Reassignment) {
        const topics = Object.entries(reassignment)
            .map(([name, partitions]) => ({
                name,
                partitions: Object.entries(partitions).map(([partition, replicas]) => ({
                    partitionIndex: parseInt(partition),
                    replicas,
                })),
            }))
            .filter(({ partitions }) => partitions.length);
        if (!topics.length) {
            log.info('No partitions to reassign');
            return;
        }

        const { controllerId } = await this.cluster.sendRequest(API.METADATA, { topics: [] });
        const sendRequest = controllerId >= 0 ? this.cluster.sendRequestToNode(controllerId) : this.cluster.sendRequest;
        await sendRequest(API.ALTER_PARTITION_REASSIGNMENTS, { timeoutMs: this.options.timeoutMs, topics });
    }
}
