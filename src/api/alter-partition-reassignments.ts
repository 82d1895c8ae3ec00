import { createApi } from '../utils/api';
import { KafkaApiError } from '../utils/error';

type AlterPartitionReassignmentsRequest = {
    timeoutMs?: number;
    topics: {
        name: string;
        partitions: {
            partitionIndex: number;
            replicas: number[];
        }[];
    }[];
};

type AlterPartitionReassignmentsResponse = {
    throttleTimeMs: number;
    errorCode: number;
    errorMessage: string | null;
    responses: {
        name: string;
        partitions: {
            partitionIndex: number;
            errorCode: number;
            errorMessage: string | null;
        }[];
    }[];
};

/*
AlterPartitionReassignments Request (Version: 0) => timeout_ms [topics] _tagged_fields 
  timeout_ms => INT32
  topics => name [partitions] _tagged_fields 
    name => COMPACT_STRING
    partitions => partition_index [replicas] _tagged_fields 
      partition_index => INT32
      replicas => INT32

AlterPartitionReassignments Response (Version: 0) => throttle_time_ms error_code error_message [responses] _tagged_fields 
  throttle_time_ms => INT32
  error_code => INT16
  error_message => COMPACT_NULLABLE_STRING
  responses => name [partitions] _tagged_fields 
    name => COMPACT_STRING
    partitions => partition_index error_code error_message _tagged_fields 
      partition_index => INT32
      error_code => INT16
      error_message => COMPACT_NULLABLE_STRING
*/
export const ALTER_PARTITION_REASSIGNMENTS = createApi<
    AlterPartitionReassignmentsRequest,
    AlterPartitionReassignmentsResponse
>({
    apiKey: 45,
    apiVersion: 0,
    requestHeaderVersion: 2,
    responseHeaderVersion: 1,
    request: (encoder, data) =>
        encoder
            .writeInt32(data.timeoutMs ?? 60_000)
            .writeCompactArray(data.topics, (encoder, topic) =>
                encoder
                    .writeCompactString(topic.name)
                    .writeCompactArray(topic.partitions, (encoder, partition) =>
                        encoder
                            .writeInt32(partition.partitionIndex)
                            .writeCompactArray(partition.replicas, (encoder, replica) => encoder.writeInt32(replica))
                            .writeTagBuffer(),
                    )
                    .writeTagBuffer(),
            )
            .writeTagBuffer(),
    response: (decoder) => {
        const throttleTimeMs = decoder.readInt32();
        const errorCode = decoder.readInt16();
        const errorMessage = decoder.readCompactString();
        const responses = decoder.readCompactArray((topic) => {
            const name = topic.readCompactString() ?? '';
            const partitions = topic.readCompactArray((partition) => {
                const result = {
                    partitionIndex: partition.readInt32(),
                    errorCode: partition.readInt16(),
                    errorMessage: partition.readCompactString(),
                };
                partition.readTagBuffer();
                return result;
            });
            topic.readTagBuffer();
            return { name, partitions };
        });
        decoder.readTagBuffer();

        const result = { throttleTimeMs, errorCode, errorMessage, responses };
        if (result.errorCode) throw new KafkaApiError(result.errorCode, result.errorMessage, result);
        result.responses.forEach((topic) => {
            topic.partitions.forEach((partition) => {
                if (partition.errorCode) {
                    throw new KafkaApiError(
                        partition.errorCode,
                        `${topic.name}-${partition.partitionIndex}${partition.errorMessage ? ` ${partition.errorMessage}` : ''}`,
                        result,
                    );
                }
            });
        });
        return result;
    },
});
