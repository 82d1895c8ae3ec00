import { describe, expect, it } from 'vitest';
import { BrokerInfo, PartitionInfo } from '../types';
import { roundRobinAcrossRacks, RoundRobinAcrossRacksStrategy } from './round-robin-across-racks';

const partitions = (count: number): PartitionInfo[] =>
    Array.from({ length: count }, (_, partition) => ({ partition, replicas: [1] }));

describe('Round robin across racks', () => {
    describe('RoundRobinAcrossRacksStrategy', () => {
        const twoRacks: BrokerInfo[] = [
            { nodeId: 1, rack: 'rackA' },
            { nodeId: 2, rack: 'rackA' },
            { nodeId: 3, rack: 'rackB' },
            { nodeId: 4, rack: 'rackB' },
        ];

        it('alternates racks in the broker ordering', () => {
            const strategy = new RoundRobinAcrossRacksStrategy({
                topic: 'orders',
                brokers: twoRacks,
                partitions: [],
                replicationFactor: 2,
            });
            expect(strategy.getBrokerOrdering()).toEqual([1, 3, 2, 4]);
        });

        it('shifts the window by the partition number', () => {
            const strategy = new RoundRobinAcrossRacksStrategy({
                topic: 'orders',
                brokers: twoRacks,
                partitions: partitions(3),
                replicationFactor: 2,
            });
            expect(strategy.reassignments()).toEqual({
                orders: {
                    0: [1, 3],
                    1: [3, 2],
                    2: [2, 4],
                },
            });
        });

        it('falls back to broker order within a single rack', () => {
            const strategy = new RoundRobinAcrossRacksStrategy({
                topic: 'orders',
                brokers: [
                    { nodeId: 1, rack: 'rackX' },
                    { nodeId: 2, rack: 'rackX' },
                    { nodeId: 3, rack: 'rackX' },
                ],
                partitions: partitions(1),
                replicationFactor: 2,
            });
            expect(strategy.reassignments()).toEqual({ orders: { 0: [1, 2] } });
        });

        it('places every replica of a partition in a different rack when there are enough racks', () => {
            const brokers: BrokerInfo[] = [
                { nodeId: 1, rack: 'a' },
                { nodeId: 2, rack: 'b' },
                { nodeId: 3, rack: 'c' },
                { nodeId: 4, rack: 'a' },
                { nodeId: 5, rack: 'b' },
                { nodeId: 6, rack: 'c' },
            ];
            const rackById = Object.fromEntries(brokers.map(({ nodeId, rack }) => [nodeId, rack] as const));

            const result = roundRobinAcrossRacks({
                topic: 'orders',
                brokers,
                partitions: partitions(12),
                replicationFactor: 3,
            }).reassignments();

            expect(Object.keys(result.orders)).toHaveLength(12);
            Object.values(result.orders).forEach((replicas) => {
                expect(new Set(replicas.map((nodeId) => rackById[nodeId])).size).toBe(3);
            });
            expect(result.orders[4]).toEqual([5, 6, 1]);
        });

        it('produces nothing for a topic without partitions', () => {
            const result = roundRobinAcrossRacks({
                topic: 'orders',
                brokers: twoRacks,
                partitions: [],
                replicationFactor: 2,
            }).reassignments();
            expect(result).toEqual({});
        });

        it('returns the same result on every call', () => {
            const strategy = roundRobinAcrossRacks({
                topic: 'orders',
                brokers: twoRacks,
                partitions: partitions(5),
                replicationFactor: 3,
            });
            expect(strategy.reassignments()).toEqual(strategy.reassignments());
        });
    });
});
