import { API } from '../api';
import { SASLProvider } from '../broker';
import { base64Decode, base64Encode, generateNonce, hash, hmac, saltPassword, xor } from '../utils/crypto';
import { KafkaRackRfError } from '../utils/error';

type ScramCredentials = { username: string; password: string };

const parseAttributes = (message: string) => {
    const attributes: Partial<Record<string, string>> = {};
    for (const pair of message.split(',')) {
        const separator = pair.indexOf('=');
        attributes[pair.slice(0, separator)] = pair.slice(separator + 1);
    }
    return attributes;
};

const escapeUsername = (username: string) => username.replace(/=/g, '=3D').replace(/,/g, '=2C');

const saslScram =
    ({ mechanism, keyLength, digest }: { mechanism: string; keyLength: number; digest: string }) =>
    ({ username, password }: ScramCredentials): SASLProvider => ({
        mechanism,
        authenticate: async ({ sendRequest }) => {
            const nonce = generateNonce();
            const firstMessage = `n=${escapeUsername(username)},r=${nonce}`;

            const { authBytes } = await sendRequest(API.SASL_AUTHENTICATE, {
                authBytes: Buffer.from(`n,,${firstMessage}`),
            });
            if (!authBytes.length) {
                throw new KafkaRackRfError('No auth response');
            }

            const serverFirstMessage = authBytes.toString();
            const { r: rnonce, s: salt, i: iterations } = parseAttributes(serverFirstMessage);
            if (!rnonce?.startsWith(nonce) || !salt || !iterations) {
                throw new KafkaRackRfError('Invalid SCRAM server challenge');
            }

            const saltedPassword = await saltPassword(
                password,
                base64Decode(salt),
                parseInt(iterations),
                keyLength,
                digest,
            );
            const clientKey = hmac(saltedPassword, 'Client Key', digest);
            const storedKey = hash(clientKey, digest);

            const finalMessageWithoutProof = `c=${base64Encode('n,,')},r=${rnonce}`;
            const authMessage = `${firstMessage},${serverFirstMessage},${finalMessageWithoutProof}`;
            const clientSignature = hmac(storedKey, authMessage, digest);
            const clientProof = base64Encode(xor(clientKey, clientSignature));

            await sendRequest(API.SASL_AUTHENTICATE, {
                authBytes: Buffer.from(`${finalMessageWithoutProof},p=${clientProof}`),
            });
        },
    });

export const saslScramSha256 = saslScram({ mechanism: 'SCRAM-SHA-256', keyLength: 32, digest: 'sha256' });
export const saslScramSha512 = saslScram({ mechanism: 'SCRAM-SHA-512', keyLength: 64, digest: 'sha512' });
