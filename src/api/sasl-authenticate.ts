import { createApi } from '../utils/api';
import { KafkaApiError } from '../utils/error';

type SaslAuthenticateRequest = {
    authBytes: Buffer;
};

type SaslAuthenticateResponse = {
    errorCode: number;
    errorMessage: string | null;
    authBytes: Buffer;
    sessionLifetimeMs: bigint;
};

/*
SaslAuthenticate Request (Version: 2) => auth_bytes _tagged_fields 
  auth_bytes => COMPACT_BYTES

SaslAuthenticate Response (Version: 2) => error_code error_message auth_bytes session_lifetime_ms _tagged_fields 
  error_code => INT16
  error_message => COMPACT_NULLABLE_STRING
  auth_bytes => COMPACT_BYTES
  session_lifetime_ms => INT64
*/
export const SASL_AUTHENTICATE = createApi<SaslAuthenticateRequest, SaslAuthenticateResponse>({
    apiKey: 36,
    apiVersion: 2,
    requestHeaderVersion: 2,
    responseHeaderVersion: 1,
    request: (encoder, data) => encoder.writeCompactBytes(data.authBytes).writeTagBuffer(),
    response: (decoder) => {
        const result = {
            errorCode: decoder.readInt16(),
            errorMessage: decoder.readCompactString(),
            authBytes: decoder.readCompactBytes() ?? Buffer.alloc(0),
            sessionLifetimeMs: decoder.readInt64(),
        };
        decoder.readTagBuffer();
        if (result.errorCode) throw new KafkaApiError(result.errorCode, result.errorMessage, result);
        return result;
    },
});
