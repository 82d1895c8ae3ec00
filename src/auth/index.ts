export { saslPlain } from './plain';
export { saslScramSha256, saslScramSha512 } from './scram';
