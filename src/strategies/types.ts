import { BrokerInfo, PartitionInfo, Reassignment } from '../types';

export type TopologySnapshot = {
    topic: string;
    brokers: BrokerInfo[];
    partitions: PartitionInfo[];
    replicationFactor: number;
};

export interface ReassignmentStrategy {
    reassignments(): Reassignment;
}

export type CreateReassignmentStrategy = (snapshot: TopologySnapshot) => ReassignmentStrategy;
