export class Encoder {
    private buffer: Buffer;
    private offset = 0;

    constructor(initialCapacity = 512) {
        this.buffer = Buffer.allocUnsafe(initialCapacity);
    }

    private ensure(extra: number) {
        const need = this.offset + extra;
        if (need <= this.buffer.length) return;
        let capacity = Math.max(this.buffer.length, 1);
        while (capacity < need) capacity <<= 1;
        const next = Buffer.allocUnsafe(capacity);
        this.buffer.copy(next, 0, 0, this.offset);
        this.buffer = next;
    }

    public getBufferLength() {
        return this.offset;
    }

    public write(src: Buffer) {
        this.ensure(src.length);
        src.copy(this.buffer, this.offset);
        this.offset += src.length;
        return this;
    }

    public writeEncoder(other: Encoder) {
        return this.write(other.value());
    }

    public writeInt8(value: number) {
        this.ensure(1);
        this.buffer.writeInt8(value, this.offset);
        this.offset += 1;
        return this;
    }

    public writeInt16(value: number) {
        this.ensure(2);
        this.buffer.writeInt16BE(value, this.offset);
        this.offset += 2;
        return this;
    }

    public writeInt32(value: number) {
        this.ensure(4);
        this.buffer.writeInt32BE(value, this.offset);
        this.offset += 4;
        return this;
    }

    public writeUVarInt(value: number) {
        const bytes: number[] = [];
        while ((value & 0xffffff80) !== 0) {
            bytes.push((value & 0x7f) | 0x80);
            value >>>= 7;
        }
        bytes.push(value & 0x7f);
        return this.write(Buffer.from(bytes));
    }

    public writeString(value: string | null) {
        if (value === null) return this.writeInt16(-1);
        const bytes = Buffer.from(value, 'utf-8');
        return this.writeInt16(bytes.length).write(bytes);
    }

    public writeCompactString(value: string | null) {
        if (value === null) return this.writeUVarInt(0);
        const bytes = Buffer.from(value, 'utf-8');
        return this.writeUVarInt(bytes.length + 1).write(bytes);
    }

    public writeUUID(value: string | null) {
        if (value === null) return this.write(Buffer.alloc(16));
        return this.write(Buffer.from(value, 'hex'));
    }

    public writeBoolean(value: boolean) {
        return this.writeInt8(value ? 1 : 0);
    }

    public writeArray<T>(items: T[], callback: (encoder: Encoder, item: T) => void) {
        this.writeInt32(items.length);
        for (const item of items) callback(this, item);
        return this;
    }

    public writeCompactArray<T>(items: T[] | null, callback: (encoder: Encoder, item: T) => void) {
        if (items === null) return this.writeUVarInt(0);
        this.writeUVarInt(items.length + 1);
        for (const item of items) callback(this, item);
        return this;
    }

    public writeCompactBytes(value: Buffer) {
        return this.writeUVarInt(value.length + 1).write(value);
    }

    public writeTagBuffer() {
        return this.writeUVarInt(0);
    }

    public value() {
        return this.buffer.subarray(0, this.offset);
    }
}
