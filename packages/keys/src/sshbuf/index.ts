/**
 * @sshkit/keys - SSH Buffer Codec
 */

export { SshWriter } from './writer';
export { SshReader } from './reader';
