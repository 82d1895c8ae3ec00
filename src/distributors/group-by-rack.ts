import { BrokerInfo } from '../types';

export type RackGroup = { rack: string; nodeIds: number[] };

/** Groups broker ids by rack label, keeping the order in which each rack is first seen */
export const groupByRack = (brokers: BrokerInfo[]) => {
    const groups = new Map<string, number[]>();
    brokers.forEach(({ nodeId, rack }) => {
        const key = rack ?? '';
        const nodeIds = groups.get(key) ?? [];
        nodeIds.push(nodeId);
        groups.set(key, nodeIds);
    });
    return Array.from(groups, ([rack, nodeIds]): RackGroup => ({ rack, nodeIds }));
};
