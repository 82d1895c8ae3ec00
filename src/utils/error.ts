import { API_ERROR } from '../api';

export class KafkaRackRfError extends Error {
    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

export class KafkaApiError<T = unknown> extends KafkaRackRfError {
    public apiName: string | undefined;
    public request: unknown | undefined;

    constructor(
        public errorCode: number,
        public errorMessage: string | null,
        public response: T,
    ) {
        const [errorName] = Object.entries(API_ERROR).find(([, value]) => value === errorCode) ?? ['UNKNOWN'];
        super(`${errorName}${errorMessage ? `: ${errorMessage}` : ''}`);
    }
}

export class ConnectionError extends KafkaRackRfError {
    constructor(message: string, stack?: string) {
        super(message);
        if (stack) this.stack = `${this.name}: ${message}\n${stack.split('\n').slice(1).join('\n')}`;
    }
}

/** Replication factor or command configuration is unusable */
export class ConfigurationError extends KafkaRackRfError {}

/** Current partitions disagree with the broker set they were read alongside */
export class TopologyMismatchError extends KafkaRackRfError {}
