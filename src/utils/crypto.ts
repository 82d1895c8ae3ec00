import { createHash, createHmac, pbkdf2, randomBytes } from 'crypto';

export const generateNonce = () => randomBytes(16).toString('base64').replace(/[\/=+]/g, '');

export const saltPassword = (password: string, salt: Buffer, iterations: number, keyLength: number, digest: string) =>
    new Promise<Buffer>((resolve, reject) =>
        pbkdf2(password, salt, iterations, keyLength, digest, (error, key) => (error ? reject(error) : resolve(key))),
    );

export const base64Encode = (input: Buffer | string) => Buffer.from(input).toString('base64');
export const base64Decode = (input: string) => Buffer.from(input, 'base64');
export const hash = (data: Buffer, digest: string) => createHash(digest).update(data).digest();
export const hmac = (key: Buffer, data: Buffer | string, digest: string) =>
    createHmac(digest, key).update(data).digest();
export const xor = (a: Buffer, b: Buffer) => Buffer.from(a.map((byte, i) => byte ^ b[i]));
