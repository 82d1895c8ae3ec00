import { groupByRack } from '../distributors/group-by-rack';
import { interleave } from '../distributors/interleave';
import { rotationWindow } from '../distributors/rotation-window';
import { Reassignment } from '../types';
import { log } from '../utils/logger';
import { CreateReassignmentStrategy, ReassignmentStrategy, TopologySnapshot } from './types';

/**
 * Orders brokers so that neighbours sit in different racks, then gives partition `p` the `replicationFactor`
 * brokers starting at position `p` of that ordering.
 */
export class RoundRobinAcrossRacksStrategy implements ReassignmentStrategy {
    private readonly rackAlternatingNodeIds: number[];

    constructor(private readonly snapshot: TopologySnapshot) {
        const groups = groupByRack(snapshot.brokers);
        this.rackAlternatingNodeIds = interleave(groups.map(({ nodeIds }) => nodeIds));
        log.debug('Rack alternating broker order', { racks: groups, order: this.rackAlternatingNodeIds });
    }

    public getBrokerOrdering() {
        return [...this.rackAlternatingNodeIds];
    }

    public reassignments() {
        const { topic, partitions, replicationFactor } = this.snapshot;
        const result: Reassignment = {};
        partitions.forEach(({ partition }) => {
            result[topic] ??= {};
            result[topic][partition] = rotationWindow(this.rackAlternatingNodeIds, partition, replicationFactor);
        });
        return result;
    }
}

export const roundRobinAcrossRacks: CreateReassignmentStrategy = (snapshot) =>
    new RoundRobinAcrossRacksStrategy(snapshot);
