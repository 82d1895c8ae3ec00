import { readFileSync } from 'fs';
import { TcpSocketConnectOpts } from 'net';
import { z } from 'zod';
import { saslPlain, saslScramSha256, saslScramSha512 } from './auth';
import { SASLProvider } from './broker';
import { ClientOptions } from './client';
import { SslOptions } from './connection';
import { ConfigurationError } from './utils/error';
import { parseProperties } from './utils/properties';

const upperCase = (value: unknown) => (typeof value === 'string' ? value.trim().toUpperCase() : value);

const commandConfigSchema = z.object({
    'bootstrap.servers': z.string().min(1).optional(),
    'client.id': z.string().optional(),
    'request.timeout.ms': z.coerce.number().int().positive().optional(),
    'security.protocol': z
        .preprocess(upperCase, z.enum(['PLAINTEXT', 'SSL', 'SASL_PLAINTEXT', 'SASL_SSL']))
        .default('PLAINTEXT'),
    'sasl.mechanism': z.preprocess(upperCase, z.enum(['PLAIN', 'SCRAM-SHA-256', 'SCRAM-SHA-512'])).default('PLAIN'),
    'sasl.username': z.string().optional(),
    'sasl.password': z.string().optional(),
    'sasl.jaas.config': z.string().optional(),
    'ssl.ca.location': z.string().optional(),
    'ssl.certificate.location': z.string().optional(),
    'ssl.key.location': z.string().optional(),
    'ssl.endpoint.identification.algorithm': z.string().optional(),
});

export type CommandConfig = z.infer<typeof commandConfigSchema>;

export const DEFAULT_BOOTSTRAP_SERVER = 'localhost:9092';

/** Parses `host:port[,host:port...]`. IPv6 hosts go in brackets: `[::1]:9092` */
export const parseBootstrapServers = (value: string): TcpSocketConnectOpts[] =>
    value
        .split(',')
        .map((server) => server.trim())
        .filter(Boolean)
        .map((server) => {
            const separator = server.lastIndexOf(':');
            const host = server.slice(0, separator).replace(/^\[(.*)\]$/, '$1');
            const port = Number(server.slice(separator + 1));
            if (separator < 1 || !host || !Number.isInteger(port) || port < 1 || port > 65535) {
                throw new ConfigurationError(`Invalid bootstrap server "${server}", expected host:port`);
            }
            return { host, port };
        });

export const parseCommandConfig = (contents: string): CommandConfig => {
    const result = commandConfigSchema.safeParse(parseProperties(contents));
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid command config (${issues.join('; ')})`);
    }
    return result.data;
};

const jaasOption = (jaasConfig: string | undefined, name: string) =>
    jaasConfig?.match(new RegExp(`\\b${name}\\s*=\\s*"([^"]*)"`))?.[1];

const createSasl = (config: CommandConfig): SASLProvider | null => {
    if (!config['security.protocol'].startsWith('SASL_')) {
        return null;
    }

    const username = config['sasl.username'] ?? jaasOption(config['sasl.jaas.config'], 'username');
    const password = config['sasl.password'] ?? jaasOption(config['sasl.jaas.config'], 'password');
    if (username === undefined || password === undefined) {
        throw new ConfigurationError(
            `security.protocol=${config['security.protocol']} needs sasl.username and sasl.password or sasl.jaas.config`,
        );
    }

    const mechanisms = {
        PLAIN: saslPlain,
        'SCRAM-SHA-256': saslScramSha256,
        'SCRAM-SHA-512': saslScramSha512,
    };
    return mechanisms[config['sasl.mechanism']]({ username, password });
};

const createSsl = (config: CommandConfig, readFile: (path: string) => string): SslOptions | null => {
    if (!config['security.protocol'].endsWith('SSL')) {
        return null;
    }

    const ssl: SslOptions = {};
    if (config['ssl.ca.location']) ssl.ca = readFile(config['ssl.ca.location']);
    if (config['ssl.certificate.location']) ssl.cert = readFile(config['ssl.certificate.location']);
    if (config['ssl.key.location']) ssl.key = readFile(config['ssl.key.location']);
    if (config['ssl.endpoint.identification.algorithm'] === '') ssl.checkServerIdentity = () => undefined;
    return ssl;
};

const readConfigFile = (path: string) => {
    try {
        return readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(
            `Could not find or read specified file ${path} (${error instanceof Error ? error.message : error})`,
        );
    }
};

/**
 * Client options from the `--bootstrap-server` value with the command config merged over it, the way the Kafka
 * command line tools do.
 */
export const createClientOptions = ({
    bootstrapServer = DEFAULT_BOOTSTRAP_SERVER,
    config = parseCommandConfig(''),
    readFile = readConfigFile,
}: {
    bootstrapServer?: string;
    config?: CommandConfig;
    readFile?: (path: string) => string;
}): ClientOptions => {
    const bootstrapServers = parseBootstrapServers(config['bootstrap.servers'] ?? bootstrapServer);
    if (!bootstrapServers.length) {
        throw new ConfigurationError('At least one bootstrap server is required');
    }

    return {
        clientId: config['client.id'] ?? 'kafka-rack-rf',
        bootstrapServers,
        sasl: createSasl(config),
        ssl: createSsl(config, readFile),
        requestTimeout: config['request.timeout.ms'],
    };
};

export const loadClientOptions = ({
    bootstrapServer,
    commandConfig,
}: {
    bootstrapServer?: string;
    commandConfig?: string;
}) =>
    createClientOptions({
        bootstrapServer,
        config: commandConfig ? parseCommandConfig(readConfigFile(commandConfig)) : undefined,
    });
