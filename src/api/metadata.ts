import { createApi } from '../utils/api';
import { KafkaApiError } from '../utils/error';
import { log } from '../utils/logger';

type MetadataRequest = {
    topics?: { id: string | null; name: string }[] | null;
    allowTopicAutoCreation?: boolean;
    includeTopicAuthorizedOperations?: boolean;
};

type MetadataResponse = {
    throttleTimeMs: number;
    brokers: {
        nodeId: number;
        host: string;
        port: number;
        rack: string | null;
    }[];
    clusterId: string | null;
    controllerId: number;
    topics: {
        errorCode: number;
        name: string;
        topicId: string;
        isInternal: boolean;
        partitions: {
            errorCode: number;
            partitionIndex: number;
            leaderId: number;
            leaderEpoch: number;
            replicaNodes: number[];
            isrNodes: number[];
            offlineReplicas: number[];
        }[];
        topicAuthorizedOperations: number;
    }[];
};
export type Metadata = MetadataResponse;

/**
 * Topic level errors fail the request. Partition level errors (an offline leader, for instance) still carry the
 * replica list, so they are only reported.
 */
const checkErrors = (result: MetadataResponse) => {
    result.topics.forEach((topic) => {
        if (topic.errorCode) throw new KafkaApiError(topic.errorCode, null, result);
        topic.partitions
            .filter((partition) => partition.errorCode)
            .forEach((partition) =>
                log.warn(`Partition ${topic.name}-${partition.partitionIndex} reported an error`, {
                    error: new KafkaApiError(partition.errorCode, null, null).message,
                }),
            );
    });
    return result;
};

/*
Metadata Request (Version: 1) => [topics] 
  topics => name 
    name => STRING

Metadata Response (Version: 1) => [brokers] controller_id [topics] 
  brokers => node_id host port rack 
    node_id => INT32
    host => STRING
    port => INT32
    rack => NULLABLE_STRING
  controller_id => INT32
  topics => error_code name is_internal [partitions] 
    error_code => INT16
    name => STRING
    is_internal => BOOLEAN
    partitions => error_code partition_index leader_id [replica_nodes] [isr_nodes] 
      error_code => INT16
      partition_index => INT32
      leader_id => INT32
      replica_nodes => INT32
      isr_nodes => INT32
*/
const METADATA_V1 = createApi<MetadataRequest, MetadataResponse>({
    apiKey: 3,
    apiVersion: 1,
    requestHeaderVersion: 1,
    responseHeaderVersion: 0,
    request: (encoder, data) =>
        data.topics
            ? encoder.writeArray(data.topics, (encoder, topic) => encoder.writeString(topic.name))
            : encoder.writeInt32(-1),
    response: (decoder) =>
        checkErrors({
            throttleTimeMs: 0,
            brokers: decoder.readArray((broker) => ({
                nodeId: broker.readInt32(),
                host: broker.readString() ?? '',
                port: broker.readInt32(),
                rack: broker.readString(),
            })),
            clusterId: null,
            controllerId: decoder.readInt32(),
            topics: decoder.readArray((topic) => ({
                errorCode: topic.readInt16(),
                name: topic.readString() ?? '',
                topicId: '',
                isInternal: topic.readBoolean(),
                partitions: topic.readArray((partition) => ({
                    errorCode: partition.readInt16(),
                    partitionIndex: partition.readInt32(),
                    leaderId: partition.readInt32(),
                    leaderEpoch: -1,
                    replicaNodes: partition.readArray((node) => node.readInt32()),
                    isrNodes: partition.readArray((node) => node.readInt32()),
                    offlineReplicas: [],
                })),
                topicAuthorizedOperations: -1,
            })),
        }),
});

/*
Metadata Request (Version: 12) => [topics] allow_auto_topic_creation include_topic_authorized_operations _tagged_fields 
  topics => topic_id name _tagged_fields 
    topic_id => UUID
    name => COMPACT_NULLABLE_STRING
  allow_auto_topic_creation => BOOLEAN
  include_topic_authorized_operations => BOOLEAN

Metadata Response (Version: 12) => throttle_time_ms [brokers] cluster_id controller_id [topics] _tagged_fields 
  throttle_time_ms => INT32
  brokers => node_id host port rack _tagged_fields 
    node_id => INT32
    host => COMPACT_STRING
    port => INT32
    rack => COMPACT_NULLABLE_STRING
  cluster_id => COMPACT_NULLABLE_STRING
  controller_id => INT32
  topics => error_code name topic_id is_internal [partitions] topic_authorized_operations _tagged_fields 
    error_code => INT16
    name => COMPACT_NULLABLE_STRING
    topic_id => UUID
    is_internal => BOOLEAN
    partitions => error_code partition_index leader_id leader_epoch [replica_nodes] [isr_nodes] [offline_replicas] _tagged_fields 
      error_code => INT16
      partition_index => INT32
      leader_id => INT32
      leader_epoch => INT32
      replica_nodes => INT32
      isr_nodes => INT32
      offline_replicas => INT32
    topic_authorized_operations => INT32
*/
export const METADATA = createApi<MetadataRequest, MetadataResponse>({
    apiKey: 3,
    apiVersion: 12,
    fallback: METADATA_V1,
    requestHeaderVersion: 2,
    responseHeaderVersion: 1,
    request: (encoder, data) =>
        encoder
            .writeCompactArray(data.topics ?? null, (encoder, topic) =>
                encoder.writeUUID(topic.id).writeCompactString(topic.name).writeTagBuffer(),
            )
            .writeBoolean(data.allowTopicAutoCreation ?? false)
            .writeBoolean(data.includeTopicAuthorizedOperations ?? false)
            .writeTagBuffer(),
    response: (decoder) => {
        const throttleTimeMs = decoder.readInt32();
        const brokers = decoder.readCompactArray((broker) => {
            const result = {
                nodeId: broker.readInt32(),
                host: broker.readCompactString() ?? '',
                port: broker.readInt32(),
                rack: broker.readCompactString(),
            };
            broker.readTagBuffer();
            return result;
        });
        const clusterId = decoder.readCompactString();
        const controllerId = decoder.readInt32();
        const topics = decoder.readCompactArray((topic) => {
            const result = {
                errorCode: topic.readInt16(),
                name: topic.readCompactString() ?? '',
                topicId: topic.readUUID(),
                isInternal: topic.readBoolean(),
                partitions: topic.readCompactArray((partition) => {
                    const result = {
                        errorCode: partition.readInt16(),
                        partitionIndex: partition.readInt32(),
                        leaderId: partition.readInt32(),
                        leaderEpoch: partition.readInt32(),
                        replicaNodes: partition.readCompactArray((node) => node.readInt32()),
                        isrNodes: partition.readCompactArray((node) => node.readInt32()),
                        offlineReplicas: partition.readCompactArray((node) => node.readInt32()),
                    };
                    partition.readTagBuffer();
                    return result;
                }),
                topicAuthorizedOperations: topic.readInt32(),
            };
            topic.readTagBuffer();
            return result;
        });
        decoder.readTagBuffer();
        return checkErrors({ throttleTimeMs, brokers, clusterId, controllerId, topics });
    },
});
