import { TransportPacket } from './packet-decoder';

export type CaptureProtocol = 'tcp' | 'udp' | 'any';

/**
 * Which transport payloads a capture delivers. An empty port list accepts
 * every port.
 */
export interface CaptureFilter {
  readonly protocol: CaptureProtocol;
  readonly ports: readonly number[];
}

export function matchesFilter(
  packet: TransportPacket,
  filter: CaptureFilter,
): boolean {
  if (filter.protocol !== 'any' && packet.protocol !== filter.protocol) {
    return false;
  }
  if (filter.ports.length === 0) {
    return true;
  }
  return (
    filter.ports.includes(packet.sourcePort) ||
    filter.ports.includes(packet.destinationPort)
  );
}

/**
 * Equivalent BPF expression, handed to the capture tool so the kernel drops
 * unwanted traffic early.
 */
export function toBpfExpression(filter: CaptureFilter): string {
  const protocol =
    filter.protocol === 'any' ? '(tcp or udp)' : filter.protocol;
  if (filter.ports.length === 0) {
    return filter.protocol === 'any' ? 'tcp or udp' : protocol;
  }
  const ports = filter.ports.map((port) => `port ${port}`).join(' or ');
  return `${protocol} and (${ports})`;
}
