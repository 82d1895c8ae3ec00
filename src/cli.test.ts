import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CliAction, main } from './cli';
import { ConfigurationError, TopologyMismatchError } from './utils/error';
import { setLogger } from './utils/logger';

const argv = (...args: string[]) => ['node', 'kafka-rack-rf', ...args];

describe('CLI', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const captureOutput = () => ({
        stdout: vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
        stderr: vi.spyOn(process.stderr, 'write').mockImplementation(() => true),
    });

    beforeEach(() => {
        setLogger(logger);
    });

    it('passes parsed options to the action', async () => {
        const action = vi.fn<Parameters<CliAction>, ReturnType<CliAction>>(async () => {});

        const exitCode = await main(
            argv('--bootstrap-server', 'kafka-1:9092', '-c', 'client.properties', '-t', 'orders', '-r', '3', '--verbose'),
            action,
        );

        expect(exitCode).toBe(0);
        expect(action).toHaveBeenCalledWith({
            bootstrapServer: 'kafka-1:9092',
            commandConfig: 'client.properties',
            topic: 'orders',
            replicationFactor: 3,
            verbose: true,
        });
    });

    it('defaults the bootstrap server', async () => {
        const action = vi.fn<Parameters<CliAction>, ReturnType<CliAction>>(async () => {});

        await main(argv('-t', 'orders', '-r', '2'), action);

        expect(action).toHaveBeenCalledWith({
            bootstrapServer: 'localhost:9092',
            topic: 'orders',
            replicationFactor: 2,
            verbose: false,
        });
    });

    it.each(['0', '-1', '1.5', 'two'])('rejects replication factor %s', async (value) => {
        const { stderr } = captureOutput();
        const action = vi.fn<Parameters<CliAction>, ReturnType<CliAction>>(async () => {});

        expect(await main(argv('-t', 'orders', '-r', value), action)).toBe(1);
        expect(action).not.toHaveBeenCalled();
        expect(stderr).toHaveBeenCalledWith(expect.stringContaining('Replication factor must be a positive integer.'));
    });

    it('requires a topic', async () => {
        const { stderr } = captureOutput();
        const action = vi.fn<Parameters<CliAction>, ReturnType<CliAction>>(async () => {});

        expect(await main(argv('-r', '2'), action)).toBe(1);
        expect(stderr).toHaveBeenCalledWith(expect.stringContaining("required option '-t, --topic <topic>'"));
    });

    it('prints the version', async () => {
        const { stdout } = captureOutput();
        expect(await main(argv('--version'))).toBe(0);
        expect(stdout).toHaveBeenCalledWith('0.1.0\n');
    });

    it.each([
        new ConfigurationError('Replication factor cannot exceed broker count (replicationFactor=5, brokers=4)'),
        new TopologyMismatchError('Partition orders-0 has replicas on unknown brokers: [9]'),
    ])('exits with 2 on $name', async (error) => {
        const exitCode = await main(argv('-t', 'orders', '-r', '5'), async () => {
            throw error;
        });

        expect(exitCode).toBe(2);
        expect(logger.error).toHaveBeenCalledWith(error.message);
    });

    it('exits with 1 on other failures', async () => {
        const error = new Error('connection refused');

        const exitCode = await main(argv('-t', 'orders', '-r', '2'), async () => {
            throw error;
        });

        expect(exitCode).toBe(1);
        expect(logger.error).toHaveBeenCalledWith('A fatal exception has occurred: connection refused', { error });
    });

    it('reports an unreadable command config before connecting', async () => {
        const exitCode = await main(argv('-c', '/nonexistent/client.properties', '-t', 'orders', '-r', '2'));

        expect(exitCode).toBe(2);
        expect(logger.error).toHaveBeenCalledWith(
            expect.stringMatching(/^Could not find or read specified file \/nonexistent\/client\.properties/),
        );
    });
});
