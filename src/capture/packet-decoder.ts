/**
 * Link-layer types understood by the packet decoder (pcap LINKTYPE_*).
 */
export const LINKTYPE_NULL = 0;
export const LINKTYPE_ETHERNET = 1;
export const LINKTYPE_RAW = 101;
export const LINKTYPE_LINUX_SLL = 113;
export const LINKTYPE_LINUX_SLL2 = 276;

export const SUPPORTED_LINKTYPES: readonly number[] = [
  LINKTYPE_NULL,
  LINKTYPE_ETHERNET,
  LINKTYPE_RAW,
  LINKTYPE_LINUX_SLL,
  LINKTYPE_LINUX_SLL2,
];

const ETHERTYPE_IPV4 = 0x0800;
const ETHERTYPE_IPV6 = 0x86dd;
const ETHERTYPE_VLAN = 0x8100;
const ETHERTYPE_QINQ = 0x88a8;

const IPPROTO_TCP = 6;
const IPPROTO_UDP = 17;

/** IPv6 extension headers skipped on the way to the transport header */
const IPV6_EXTENSIONS = new Set([0, 43, 60]);
const IPV6_FRAGMENT = 44;

const TCP_FIN = 0x01;
const TCP_RST = 0x04;

export type TransportProtocol = 'tcp' | 'udp';

export interface TransportPacket {
  readonly protocol: TransportProtocol;
  readonly sourceAddress: string;
  readonly sourcePort: number;
  readonly destinationAddress: string;
  readonly destinationPort: number;
  readonly payload: Buffer;
  /** TCP only: FIN or RST set */
  readonly closing: boolean;
}

/**
 * Decode one captured frame down to its TCP or UDP payload.
 *
 * Returns null for anything that is not an unfragmented IPv4/IPv6 TCP or UDP
 * packet, including truncated captures.
 */
export function decodePacket(
  linktype: number,
  frame: Buffer,
): TransportPacket | null {
  const network = stripLinkLayer(linktype, frame);
  if (!network) {
    return null;
  }
  switch (network.ethertype) {
    case ETHERTYPE_IPV4:
      return decodeIpv4(network.data);
    case ETHERTYPE_IPV6:
      return decodeIpv6(network.data);
    default:
      return null;
  }
}

interface NetworkLayer {
  ethertype: number;
  data: Buffer;
}

function stripLinkLayer(linktype: number, frame: Buffer): NetworkLayer | null {
  switch (linktype) {
    case LINKTYPE_ETHERNET: {
      let offset = 12;
      if (frame.length < offset + 2) return null;
      let ethertype = frame.readUInt16BE(offset);
      while (ethertype === ETHERTYPE_VLAN || ethertype === ETHERTYPE_QINQ) {
        offset += 4;
        if (frame.length < offset + 2) return null;
        ethertype = frame.readUInt16BE(offset);
      }
      return { ethertype, data: frame.subarray(offset + 2) };
    }
    case LINKTYPE_NULL: {
      if (frame.length < 4) return null;
      // Address family in the capturing host's byte order
      const family = Math.min(frame.readUInt32LE(0), frame.readUInt32BE(0));
      const ethertype =
        family === 2
          ? ETHERTYPE_IPV4
          : family === 24 || family === 28 || family === 30
            ? ETHERTYPE_IPV6
            : 0;
      return { ethertype, data: frame.subarray(4) };
    }
    case LINKTYPE_RAW: {
      if (frame.length < 1) return null;
      const version = frame[0] >> 4;
      const ethertype =
        version === 4 ? ETHERTYPE_IPV4 : version === 6 ? ETHERTYPE_IPV6 : 0;
      return { ethertype, data: frame };
    }
    case LINKTYPE_LINUX_SLL:
      if (frame.length < 16) return null;
      return { ethertype: frame.readUInt16BE(14), data: frame.subarray(16) };
    case LINKTYPE_LINUX_SLL2:
      if (frame.length < 20) return null;
      return { ethertype: frame.readUInt16BE(0), data: frame.subarray(20) };
    default:
      return null;
  }
}

function decodeIpv4(packet: Buffer): TransportPacket | null {
  if (packet.length < 20 || packet[0] >> 4 !== 4) {
    return null;
  }
  const headerLength = (packet[0] & 0x0f) * 4;
  const totalLength = packet.readUInt16BE(2);
  const fragment = packet.readUInt16BE(6);
  const moreFragments = (fragment & 0x2000) !== 0;
  const fragmentOffset = fragment & 0x1fff;
  if (
    headerLength < 20 ||
    totalLength < headerLength ||
    packet.length < totalLength ||
    moreFragments ||
    fragmentOffset !== 0
  ) {
    return null;
  }
  return decodeTransport(
    packet[9],
    formatIpv4(packet.subarray(12, 16)),
    formatIpv4(packet.subarray(16, 20)),
    // Ethernet may pad short frames; the IP length is authoritative
    packet.subarray(headerLength, totalLength),
  );
}

function decodeIpv6(packet: Buffer): TransportPacket | null {
  if (packet.length < 40 || packet[0] >> 4 !== 6) {
    return null;
  }
  const end = 40 + packet.readUInt16BE(4);
  if (packet.length < end) {
    return null;
  }

  let next = packet[6];
  let offset = 40;
  while (IPV6_EXTENSIONS.has(next)) {
    if (offset + 2 > end) return null;
    const length = (packet[offset + 1] + 1) * 8;
    next = packet[offset];
    offset += length;
  }
  if (next === IPV6_FRAGMENT || offset > end) {
    return null;
  }

  return decodeTransport(
    next,
    formatIpv6(packet.subarray(8, 24)),
    formatIpv6(packet.subarray(24, 40)),
    packet.subarray(offset, end),
  );
}

function decodeTransport(
  protocol: number,
  sourceAddress: string,
  destinationAddress: string,
  segment: Buffer,
): TransportPacket | null {
  if (protocol === IPPROTO_TCP) {
    if (segment.length < 20) return null;
    const dataOffset = (segment[12] >> 4) * 4;
    if (dataOffset < 20 || segment.length < dataOffset) return null;
    const flags = segment[13];
    return {
      protocol: 'tcp',
      sourceAddress,
      sourcePort: segment.readUInt16BE(0),
      destinationAddress,
      destinationPort: segment.readUInt16BE(2),
      payload: segment.subarray(dataOffset),
      closing: (flags & (TCP_FIN | TCP_RST)) !== 0,
    };
  }
  if (protocol === IPPROTO_UDP) {
    if (segment.length < 8) return null;
    const length = segment.readUInt16BE(4);
    if (length < 8 || segment.length < length) return null;
    return {
      protocol: 'udp',
      sourceAddress,
      sourcePort: segment.readUInt16BE(0),
      destinationAddress,
      destinationPort: segment.readUInt16BE(2),
      payload: segment.subarray(8, length),
      closing: false,
    };
  }
  return null;
}

function formatIpv4(bytes: Buffer): string {
  return Array.from(bytes).join('.');
}

/**
 * RFC 5952 text form: lowercase hex, longest run of two or more zero groups
 * collapsed to `::`.
 */
export function formatIpv6(bytes: Buffer): string {
  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push(bytes.readUInt16BE(i));
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLength < 2) {
    return hex.join(':');
  }
  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}
