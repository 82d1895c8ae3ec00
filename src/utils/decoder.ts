export class Decoder {
    private offset = 0;

    constructor(private buffer: Buffer) {}

    public getOffset() {
        return this.offset;
    }

    public canReadBytes(length: number) {
        return this.buffer.length - this.offset >= length;
    }

    public readInt8() {
        const value = this.buffer.readInt8(this.offset);
        this.offset += 1;
        return value;
    }

    public readInt16() {
        const value = this.buffer.readInt16BE(this.offset);
        this.offset += 2;
        return value;
    }

    public readInt32() {
        const value = this.buffer.readInt32BE(this.offset);
        this.offset += 4;
        return value;
    }

    public readInt64() {
        const value = this.buffer.readBigInt64BE(this.offset);
        this.offset += 8;
        return value;
    }

    public readUVarInt() {
        let result = 0;
        let shift = 0;
        let currentByte;
        do {
            currentByte = this.buffer[this.offset++];
            result |= (currentByte & 0x7f) << shift;
            shift += 7;
        } while ((currentByte & 0x80) !== 0);
        return result >>> 0;
    }

    public readString() {
        const length = this.readInt16();
        if (length < 0) {
            return null;
        }
        return this.read(length).toString('utf-8');
    }

    public readCompactString() {
        const length = this.readUVarInt() - 1;
        if (length < 0) {
            return null;
        }
        return this.read(length).toString('utf-8');
    }

    public readUUID() {
        return this.read(16).toString('hex');
    }

    public readBoolean() {
        return this.readInt8() === 1;
    }

    public readArray<T>(callback: (decoder: Decoder) => T): T[] {
        const length = this.readInt32();
        return Array.from({ length: Math.max(length, 0) }).map(() => callback(this));
    }

    public readCompactArray<T>(callback: (decoder: Decoder) => T): T[] {
        const length = this.readUVarInt() - 1;
        return Array.from({ length: Math.max(length, 0) }).map(() => callback(this));
    }

    public read(length = this.buffer.length - this.offset) {
        const value = this.buffer.subarray(this.offset, this.offset + length);
        this.offset += length;
        return value;
    }

    public readCompactBytes() {
        const length = this.readUVarInt() - 1;
        if (length < 0) {
            return null;
        }
        return this.read(length);
    }

    public readTagBuffer() {
        const tags: Record<number, Buffer> = {};
        const count = this.readUVarInt();
        for (let i = 0; i < count; i++) {
            const tag = this.readUVarInt();
            tags[tag] = this.read(this.readUVarInt());
        }
        return tags;
    }
}
