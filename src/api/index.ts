import { ALTER_PARTITION_REASSIGNMENTS } from './alter-partition-reassignments';
import { API_VERSIONS } from './api-versions';
import { METADATA } from './metadata';
import { SASL_AUTHENTICATE } from './sasl-authenticate';
import { SASL_HANDSHAKE } from './sasl-handshake';

export const API = {
    API_VERSIONS,
    METADATA,
    SASL_HANDSHAKE,
    SASL_AUTHENTICATE,
    ALTER_PARTITION_REASSIGNMENTS,
};

const apiNameByKey: Record<number, string> = Object.fromEntries(
    Object.entries(API).map(([name, api]) => [api.apiKey, name]),
);

export const getApiName = (api: { apiKey: number }) => apiNameByKey[api.apiKey] ?? 'UNKNOWN';

export const API_ERROR = {
    UNKNOWN_SERVER_ERROR: -1,
    NONE: 0,
    CORRUPT_MESSAGE: 2,
    UNKNOWN_TOPIC_OR_PARTITION: 3,
    LEADER_NOT_AVAILABLE: 5,
    NOT_LEADER_OR_FOLLOWER: 6,
    REQUEST_TIMED_OUT: 7,
    BROKER_NOT_AVAILABLE: 8,
    REPLICA_NOT_AVAILABLE: 9,
    NETWORK_EXCEPTION: 13,
    INVALID_TOPIC_EXCEPTION: 17,
    TOPIC_AUTHORIZATION_FAILED: 29,
    CLUSTER_AUTHORIZATION_FAILED: 31,
    UNSUPPORTED_SASL_MECHANISM: 33,
    ILLEGAL_SASL_STATE: 34,
    UNSUPPORTED_VERSION: 35,
    INVALID_PARTITIONS: 37,
    INVALID_REPLICATION_FACTOR: 38,
    INVALID_REPLICA_ASSIGNMENT: 39,
    NOT_CONTROLLER: 41,
    INVALID_REQUEST: 42,
    POLICY_VIOLATION: 44,
    KAFKA_STORAGE_ERROR: 56,
    SASL_AUTHENTICATION_FAILED: 58,
    REASSIGNMENT_IN_PROGRESS: 60,
    NO_REASSIGNMENT_IN_PROGRESS: 85,
    UNKNOWN_TOPIC_ID: 100,
};
