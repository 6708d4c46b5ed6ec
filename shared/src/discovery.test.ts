import assert from 'node:assert/strict';
import test from 'node:test';
import {
  DEFAULT_SERVER_NAME,
  DEFAULT_SERVER_PORT,
  broadcastAddressFor,
  encodeDiscoveryPacket,
  parseDiscoveryPacket
} from './discovery.js';

void test('announcements parse back to the packet that was sent', () => {
  const packet = {
    type: 'gearledger_server' as const,
    ip: '192.168.1.20',
    ips: ['192.168.1.20', '10.0.0.5'],
    port: 8080,
    name: 'Warehouse'
  };

  assert.deepEqual(parseDiscoveryPacket(encodeDiscoveryPacket(packet), '192.168.1.99'), packet);
});

void test('malformed or foreign datagrams are ignored', () => {
  assert.equal(parseDiscoveryPacket('not json', '10.0.0.1'), null);
  assert.equal(parseDiscoveryPacket('[1,2]', '10.0.0.1'), null);
  assert.equal(parseDiscoveryPacket('null', '10.0.0.1'), null);
  assert.equal(parseDiscoveryPacket('{"type":"other_server","port":8080}', '10.0.0.1'), null);
});

void test('missing fields fall back to the source address and defaults', () => {
  assert.deepEqual(parseDiscoveryPacket('{"type":"gearledger_server","port":"x","ips":["", 7]}', '10.0.0.7'), {
    type: 'gearledger_server',
    ip: '10.0.0.7',
    port: DEFAULT_SERVER_PORT,
    name: DEFAULT_SERVER_NAME
  });
});

void test('broadcast address is the /24 of an IPv4 address', () => {
  assert.equal(broadcastAddressFor('192.168.1.20'), '192.168.1.255');
  assert.equal(broadcastAddressFor('fe80::1'), '255.255.255.255');
  assert.equal(broadcastAddressFor('localhost'), '255.255.255.255');
});
