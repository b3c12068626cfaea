export const PEERSTREAM_VERSION = '0.1.0';
