export type BrokerInfo = {
    nodeId: number;
    /** `null` or `''` when the broker reports no rack */
    rack: string | null;
};

export type PartitionInfo = {
    partition: number;
    /** Current replica ids, leader first */
    replicas: number[];
};

/** New replica list per partition of each topic */
export type Reassignment = { [topicName: string]: { [partition: number]: number[] } };

/** Source of cluster topology and sink for the computed reassignment */
export interface ClusterGateway {
    describeBrokers(): Promise<BrokerInfo[]>;
    describePartitions(topic: string): Promise<PartitionInfo[]>;
    alterPartitionReassignments(reassignment: Reassignment): Promise<void>;
}
