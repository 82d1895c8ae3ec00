import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { createKafkaClient } from './client';
import { loadClientOptions } from './config';
import { alterReplicationFactor } from './reassignment';
import { ConfigurationError, TopologyMismatchError } from './utils/error';
import { log, LogLevel, setLogLevel } from './utils/logger';

export const VERSION = '0.1.0';

export type CliOptions = {
    bootstrapServer: string;
    commandConfig?: string;
    topic: string;
    replicationFactor: number;
    verbose: boolean;
};

export type CliAction = (options: CliOptions) => Promise<void>;

const parseReplicationFactor = (value: string) => {
    const replicationFactor = Number(value);
    if (!Number.isInteger(replicationFactor) || replicationFactor < 1) {
        throw new InvalidArgumentError('Replication factor must be a positive integer.');
    }
    return replicationFactor;
};

export const runAlterReplicationFactor: CliAction = async ({
    bootstrapServer,
    commandConfig,
    topic,
    replicationFactor,
    verbose,
}) => {
    if (verbose) setLogLevel(LogLevel.DEBUG);

    const admin = createKafkaClient(loadClientOptions({ bootstrapServer, commandConfig })).createAdmin();
    await admin.connect();
    try {
        await alterReplicationFactor({ gateway: admin, topic, replicationFactor });
    } finally {
        await admin.disconnect();
    }
};

export const createProgram = (action: CliAction = runAlterReplicationFactor) =>
    new Command()
        .name('kafka-rack-rf')
        .description('Alter the replication factor of a topic, spreading replicas across racks')
        .version(VERSION)
        .option('-b, --bootstrap-server <servers>', 'List of Kafka bootstrap servers', 'localhost:9092')
        .option('-c, --command-config <file>', 'Config file containing properties like security credentials')
        .requiredOption('-t, --topic <topic>', 'Topic to alter replication factor on')
        .requiredOption('-r, --replication-factor <count>', 'New replication factor', parseReplicationFactor)
        .option('--verbose', 'Log debug output', false)
        .exitOverride()
        .action((options: CliOptions) => action(options));

/** Runs the command line and resolves with the process exit code */
export const main = async (argv: string[], action?: CliAction) => {
    try {
        await createProgram(action).parseAsync(argv);
        return 0;
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        if (error instanceof ConfigurationError || error instanceof TopologyMismatchError) {
            log.error(error.message);
            return 2;
        }
        log.error(`A fatal exception has occurred: ${error instanceof Error ? error.message : error}`, { error });
        return 1;
    }
};
