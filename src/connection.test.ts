import net, { Socket } from 'net';
import { describe, expect, it, vi } from 'vitest';
import { API } from './api';
import { Connection } from './connection';
import { Encoder } from './utils/encoder';
import { ConnectionError, KafkaApiError } from './utils/error';

/** Connects a `Connection` to a socket that records writes and never touches the network */
const connect = async () => {
    const socket = new Socket();
    const written: Buffer[] = [];
    vi.spyOn(socket, 'write').mockImplementation((data, _encoding, callback) => {
        if (typeof data !== 'string') written.push(Buffer.from(data));
        callback?.();
        return true;
    });
    vi.spyOn(net, 'connect').mockImplementation((_options, connectionListener) => {
        process.nextTick(() => connectionListener?.());
        return socket;
    });

    const connection = new Connection({
        clientId: 'test-client',
        connection: { host: 'kafka-1', port: 9092 },
        ssl: null,
        requestTimeout: 1000,
    });
    await connection.connect();
    return { connection, socket, written };
};

const apiVersionOf = (request: Buffer) => request.readInt16BE(6);
const correlationIdOf = (request: Buffer) => request.readInt32BE(8);

const frame = (correlationId: number, writeBody: (encoder: Encoder) => Encoder, headerTags = false) => {
    const payload = new Encoder().writeInt32(correlationId);
    if (headerTags) payload.writeTagBuffer();
    writeBody(payload);
    return new Encoder().writeInt32(payload.getBufferLength()).writeEncoder(payload).value();
};

const emptyMetadataV12 = (encoder: Encoder) =>
    encoder
        .writeInt32(0)
        .writeUVarInt(1)
        .writeCompactString(null)
        .writeInt32(1)
        .writeUVarInt(1)
        .writeTagBuffer();

describe('Connection', () => {
    describe('version negotiation', () => {
        it('uses the newest metadata version by default', async () => {
            const { connection, socket, written } = await connect();

            const response = connection.sendRequest(API.METADATA, { topics: [] });
            expect(apiVersionOf(written[0])).toBe(12);
            socket.emit('data', frame(correlationIdOf(written[0]), emptyMetadataV12, true));

            expect(await response).toEqual({
                throttleTimeMs: 0,
                brokers: [],
                clusterId: null,
                controllerId: 1,
                topics: [],
            });
        });

        it('falls back to a metadata version that still reports racks', async () => {
            const { connection, socket, written } = await connect();
            connection.setVersions({ 3: { minVersion: 0, maxVersion: 9 } });

            const response = connection.sendRequest(API.METADATA, { topics: [] });
            expect(apiVersionOf(written[0])).toBe(1);
            socket.emit(
                'data',
                frame(correlationIdOf(written[0]), (encoder) =>
                    encoder
                        .writeArray(
                            [
                                { nodeId: 1, rack: 'rackA' },
                                { nodeId: 2, rack: 'rackB' },
                            ],
                            (encoder, broker) =>
                                encoder
                                    .writeInt32(broker.nodeId)
                                    .writeString(`kafka-${broker.nodeId}`)
                                    .writeInt32(9092)
                                    .writeString(broker.rack),
                        )
                        .writeInt32(2)
                        .writeInt32(0),
                ),
            );

            const { brokers, controllerId } = await response;
            expect(brokers).toEqual([
                { nodeId: 1, host: 'kafka-1', port: 9092, rack: 'rackA' },
                { nodeId: 2, host: 'kafka-2', port: 9092, rack: 'rackB' },
            ]);
            expect(controllerId).toBe(2);
        });

        it('rejects when no version of the api is supported', async () => {
            const { connection } = await connect();
            connection.setVersions({ 3: { minVersion: 13, maxVersion: 13 } });

            await expect(connection.sendRequest(API.METADATA, { topics: [] })).rejects.toThrow(
                new ConnectionError('Broker does not support API METADATA version 1 (minVersion=13, maxVersion=13)'),
            );
        });

        it('rejects when the broker does not know the api', async () => {
            const { connection } = await connect();
            connection.setVersions({});

            await expect(connection.sendRequest(API.METADATA, { topics: [] })).rejects.toThrow(
                new ConnectionError('Broker does not support API METADATA'),
            );
        });
    });

    describe('response framing', () => {
        it('waits for a response split across chunks', async () => {
            const { connection, socket, written } = await connect();

            const response = connection.sendRequest(API.METADATA, { topics: [] });
            const bytes = frame(correlationIdOf(written[0]), emptyMetadataV12, true);
            socket.emit('data', bytes.subarray(0, 3));
            socket.emit('data', bytes.subarray(3));

            expect((await response).controllerId).toBe(1);
        });

        it('routes responses arriving in one chunk by correlation id', async () => {
            const { connection, socket, written } = await connect();

            const first = connection.sendRequest(API.METADATA, { topics: [] });
            const second = connection.sendRequest(API.METADATA, { topics: [] });
            socket.emit(
                'data',
                Buffer.concat([
                    frame(
                        correlationIdOf(written[1]),
                        (encoder) =>
                            encoder
                                .writeInt32(0)
                                .writeUVarInt(1)
                                .writeCompactString(null)
                                .writeInt32(2)
                                .writeUVarInt(1)
                                .writeTagBuffer(),
                        true,
                    ),
                    frame(correlationIdOf(written[0]), emptyMetadataV12, true),
                ]),
            );

            expect((await first).controllerId).toBe(1);
            expect((await second).controllerId).toBe(2);
        });

        it('rejects pending requests when the socket closes', async () => {
            const { connection, socket } = await connect();

            const response = connection.sendRequest(API.METADATA, { topics: [] });
            socket.emit('close');

            await expect(response).rejects.toThrow(new ConnectionError('Socket closed unexpectedly'));
        });

        it('attaches the api name and request to broker errors', async () => {
            const { connection, socket, written } = await connect();
            connection.setVersions({ 3: { minVersion: 0, maxVersion: 1 } });

            const response = connection.sendRequest(API.METADATA, { topics: [{ id: null, name: 'missing' }] });
            socket.emit(
                'data',
                frame(correlationIdOf(written[0]), (encoder) =>
                    encoder
                        .writeInt32(0)
                        .writeInt32(1)
                        .writeArray([3], (encoder, errorCode) =>
                            encoder.writeInt16(errorCode).writeString('missing').writeBoolean(false).writeInt32(0),
                        ),
                ),
            );

            const error = await response.catch((error: unknown) => error);
            expect(error).toBeInstanceOf(KafkaApiError);
            expect(error).toMatchObject({
                errorCode: 3,
                apiName: 'METADATA',
                request: { topics: [{ id: null, name: 'missing' }] },
            });
        });
    });
});
