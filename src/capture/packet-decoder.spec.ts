import {
  LINKTYPE_ETHERNET,
  LINKTYPE_LINUX_SLL,
  LINKTYPE_LINUX_SLL2,
  LINKTYPE_NULL,
  LINKTYPE_RAW,
  decodePacket,
  formatIpv6,
} from './packet-decoder';
import {
  TCP_FIN_ACK,
  ethernet,
  ipv4,
  ipv6,
  linuxCooked,
} from '../../test/utils/pcap-builder';

const DNS_QUERY = {
  src: '10.0.0.5',
  dst: '10.0.0.1',
  sport: 40000,
  dport: 53,
  payload: 'query',
};

describe('decodePacket', () => {
  it('should decode UDP over IPv4 over Ethernet', () => {
    const packet = decodePacket(
      LINKTYPE_ETHERNET,
      ethernet(ipv4('udp', DNS_QUERY)),
    );

    expect(packet).toEqual({
      protocol: 'udp',
      sourceAddress: '10.0.0.5',
      sourcePort: 40000,
      destinationAddress: '10.0.0.1',
      destinationPort: 53,
      payload: Buffer.from('query'),
      closing: false,
    });
  });

  it('should decode TCP and report FIN', () => {
    const packet = decodePacket(
      LINKTYPE_ETHERNET,
      ethernet(
        ipv4('tcp', {
          src: '192.168.1.20',
          dst: '192.168.1.1',
          sport: 5000,
          dport: 502,
          payload: 'frame',
          flags: TCP_FIN_ACK,
        }),
      ),
    );

    expect(packet?.protocol).toBe('tcp');
    expect(packet?.payload.toString()).toBe('frame');
    expect(packet?.closing).toBe(true);
  });

  it('should skip VLAN tags', () => {
    const packet = decodePacket(
      LINKTYPE_ETHERNET,
      ethernet(ipv4('udp', DNS_QUERY), { vlan: 42 }),
    );

    expect(packet?.destinationPort).toBe(53);
  });

  it('should ignore Ethernet padding after the IP packet', () => {
    const padded = Buffer.concat([
      ethernet(ipv4('udp', { ...DNS_QUERY, payload: 'a' })),
      Buffer.alloc(10),
    ]);

    expect(decodePacket(LINKTYPE_ETHERNET, padded)?.payload).toEqual(
      Buffer.from('a'),
    );
  });

  it('should decode IPv6', () => {
    const packet = decodePacket(
      LINKTYPE_RAW,
      ipv6('udp', {
        src: '2001:db8::5',
        dst: '2001:db8::1',
        sport: 40000,
        dport: 53,
        payload: 'v6',
      }),
    );

    expect(packet?.sourceAddress).toBe('2001:db8::5');
    expect(packet?.destinationAddress).toBe('2001:db8::1');
    expect(packet?.payload.toString()).toBe('v6');
  });

  it('should decode Linux cooked captures v1 and v2', () => {
    const ip = ipv4('udp', DNS_QUERY);
    const sll2 = Buffer.concat([Buffer.from([0x08, 0x00]), Buffer.alloc(18), ip]);

    expect(decodePacket(LINKTYPE_LINUX_SLL, linuxCooked(ip))?.sourcePort).toBe(
      40000,
    );
    expect(decodePacket(LINKTYPE_LINUX_SLL2, sll2)?.sourcePort).toBe(40000);
  });

  it('should decode BSD loopback in either byte order', () => {
    const ip = ipv4('udp', DNS_QUERY);
    const little = Buffer.concat([Buffer.from([2, 0, 0, 0]), ip]);
    const big = Buffer.concat([Buffer.from([0, 0, 0, 2]), ip]);

    expect(decodePacket(LINKTYPE_NULL, little)?.destinationPort).toBe(53);
    expect(decodePacket(LINKTYPE_NULL, big)?.destinationPort).toBe(53);
  });

  it('should return null for fragments, truncation and other protocols', () => {
    const fragment = ipv4('udp', DNS_QUERY, { moreFragments: true });
    const truncated = ipv4('udp', DNS_QUERY).subarray(0, 30);
    const arp = ethernet(Buffer.alloc(28), { ethertype: 0x0806 });

    expect(decodePacket(LINKTYPE_RAW, fragment)).toBeNull();
    expect(decodePacket(LINKTYPE_RAW, truncated)).toBeNull();
    expect(decodePacket(LINKTYPE_ETHERNET, arp)).toBeNull();
    expect(decodePacket(147, ipv4('udp', DNS_QUERY))).toBeNull();
  });
});

describe('formatIpv6', () => {
  it('should compress the longest zero run', () => {
    const bytes = (hex: string) => Buffer.from(hex, 'hex');

    expect(formatIpv6(bytes('00000000000000000000000000000001'))).toBe('::1');
    expect(formatIpv6(bytes('00000000000000000000000000000000'))).toBe('::');
    expect(formatIpv6(bytes('20010db8000000010000000000000001'))).toBe(
      '2001:db8:0:1::1',
    );
    expect(formatIpv6(bytes('20010db8000100020003000400050006'))).toBe(
      '2001:db8:1:2:3:4:5:6',
    );
  });
});
