// Per-peer details are not exposed yet; the empty record keeps the shape stable
export type NtpPeerDetails = Record<string, never>;

const HOST_ADDRESS = /Host Address:\s*(\S+)/g;

/** Parses `show sntp server` into peers keyed by host address. */
export function parseNtpPeers(output: string): Record<string, NtpPeerDetails> {
  const peers: Record<string, NtpPeerDetails> = {};
  for (const match of output.matchAll(HOST_ADDRESS)) {
    peers[match[1]] = {};
  }
  return peers;
}
