import { roundRobinAcrossRacks } from './strategies/round-robin-across-racks';
import { CreateReassignmentStrategy, TopologySnapshot } from './strategies/types';
import { BrokerInfo, ClusterGateway, PartitionInfo, Reassignment } from './types';
import { ConfigurationError, TopologyMismatchError } from './utils/error';
import { log } from './utils/logger';

export type PlanReassignmentOptions = TopologySnapshot & {
    strategy?: CreateReassignmentStrategy;
};

export type AlterReplicationFactorOptions = {
    gateway: ClusterGateway;
    topic: string;
    replicationFactor: number;
    strategy?: CreateReassignmentStrategy;
};

export const validateReplicationFactor = (brokers: BrokerInfo[], replicationFactor: number) => {
    if (!Number.isInteger(replicationFactor) || replicationFactor < 1) {
        throw new ConfigurationError(`Replication factor must be a positive integer (replicationFactor=${replicationFactor})`);
    }
    const brokerCount = new Set(brokers.map(({ nodeId }) => nodeId)).size;
    if (replicationFactor > brokerCount) {
        throw new ConfigurationError(
            `Replication factor cannot exceed broker count (replicationFactor=${replicationFactor}, brokers=${brokerCount})`,
        );
    }
};

export const validateTopology = (topic: string, brokers: BrokerInfo[], partitions: PartitionInfo[]) => {
    const nodeIds = new Set<number>();
    brokers.forEach(({ nodeId }) => {
        if (nodeIds.has(nodeId)) throw new TopologyMismatchError(`Broker ${nodeId} is listed more than once`);
        nodeIds.add(nodeId);
    });

    const seenPartitions = new Set<number>();
    partitions.forEach(({ partition, replicas }) => {
        if (!Number.isInteger(partition) || partition < 0) {
            throw new TopologyMismatchError(`Invalid partition number ${partition} for topic ${topic}`);
        }
        if (seenPartitions.has(partition)) {
            throw new TopologyMismatchError(`Partition ${topic}-${partition} is listed more than once`);
        }
        seenPartitions.add(partition);

        if (new Set(replicas).size !== replicas.length) {
            throw new TopologyMismatchError(`Partition ${topic}-${partition} repeats a replica: [${replicas.join(', ')}]`);
        }
        const unknownReplicas = replicas.filter((replica) => !nodeIds.has(replica));
        if (unknownReplicas.length) {
            throw new TopologyMismatchError(
                `Partition ${topic}-${partition} has replicas on unknown brokers: [${unknownReplicas.join(', ')}]`,
            );
        }
    });
};

/** Computes the new replica lists without touching the cluster. Throws before producing anything if inputs are unusable. */
export const planReassignment = ({
    topic,
    brokers,
    partitions,
    replicationFactor,
    strategy = roundRobinAcrossRacks,
}: PlanReassignmentOptions): Reassignment => {
    validateReplicationFactor(brokers, replicationFactor);
    validateTopology(topic, brokers, partitions);
    return strategy({ topic, brokers, partitions, replicationFactor }).reassignments();
};

export const alterReplicationFactor = async ({
    gateway,
    topic,
    replicationFactor,
    strategy,
}: AlterReplicationFactorOptions) => {
    const partitions = await gateway.describePartitions(topic);
    const brokers = await gateway.describeBrokers();

    log.info('Current assignments', {
        topic,
        assignments: Object.fromEntries(partitions.map(({ partition, replicas }) => [partition, replicas] as const)),
    });

    const reassignment = planReassignment({ topic, brokers, partitions, replicationFactor, strategy });
    log.info('Reassignments', { topic, assignments: reassignment[topic] ?? {} });

    await gateway.alterPartitionReassignments(reassignment);
    log.info(`Replication factor for topic ${topic} updated to ${replicationFactor}`);

    return reassignment;
};
