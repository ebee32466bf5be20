import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { RegistryError } from '../../src/core/errors.js';
import { defaultRegistry, normalizeSuffix, NO_SERVER, TldRegistry } from '../../src/whois/registry.js';

function writeTemp(name: string, content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'whoiskit-registry-'));
  const file = join(dir, name);
  writeFileSync(file, content);
  return file;
}

describe('TldRegistry', () => {
  describe('normalizeSuffix', () => {
    it('should lower-case and prefix a dot', () => {
      expect(normalizeSuffix('COM')).toBe('.com');
      expect(normalizeSuffix(' .Org ')).toBe('.org');
    });
  });

  describe('lookup', () => {
    const registry = TldRegistry.fromRecord({
      '.com': 'whois.verisign-grs.com',
      '.ad': NO_SERVER,
    });

    it('should return the server for a listed suffix', () => {
      expect(registry.lookup('.com')).toEqual({ status: 'server', server: 'whois.verisign-grs.com' });
    });

    it('should fold case', () => {
      expect(registry.lookup('.COM')).toEqual({ status: 'server', server: 'whois.verisign-grs.com' });
      expect(registry.has('.Com')).toBe(true);
    });

    it('should tell a suffix without server apart from an unlisted one', () => {
      expect(registry.lookup('.ad')).toEqual({ status: 'no-server' });
      expect(registry.lookup('.zz')).toEqual({ status: 'unlisted' });
      expect(registry.has('.ad')).toBe(true);
      expect(registry.has('.zz')).toBe(false);
    });
  });

  describe('construction', () => {
    it('should normalize keys', () => {
      const registry = new TldRegistry([['NET', ' whois.verisign-grs.com ']]);
      expect([...registry]).toEqual([['.net', 'whois.verisign-grs.com']]);
    });

    it('should reject keys that collide after normalization', () => {
      expect(() => new TldRegistry([['.com', 'a.example'], ['COM', 'b.example']]))
        .toThrow('Duplicate registry suffix .com');
    });

    it('should reject empty servers and suffixes', () => {
      expect(() => new TldRegistry([['.com', '  ']])).toThrow(RegistryError);
      expect(() => new TldRegistry([['.', 'whois.example']])).toThrow('Invalid registry suffix "."');
    });
  });

  describe('extend', () => {
    it('should return a new registry and leave the original untouched', () => {
      const base = TldRegistry.fromRecord({ '.com': 'whois.verisign-grs.com' });
      const extended = base.extend({ '.test': 'whois.test.example', '.COM': 'whois.other.example' });

      expect(extended.lookup('.test')).toEqual({ status: 'server', server: 'whois.test.example' });
      expect(extended.lookup('.com')).toEqual({ status: 'server', server: 'whois.other.example' });
      expect(base.lookup('.com')).toEqual({ status: 'server', server: 'whois.verisign-grs.com' });
      expect(base.size).toBe(1);
      expect(extended.size).toBe(2);
    });

    it('should accept entry tuples', () => {
      const extended = TldRegistry.fromRecord({}).extend([['.zz', NO_SERVER]]);
      expect(extended.lookup('.zz')).toEqual({ status: 'no-server' });
    });
  });

  describe('servers', () => {
    const registry = TldRegistry.fromRecord({
      '.com': 'whois.verisign-grs.com',
      '.ad': NO_SERVER,
      '.xn--p1ai': 'whois.tcinet.ru',
    });

    it('should skip suffixes without a server and IDN suffixes', () => {
      expect(registry.servers()).toEqual([{ suffix: '.com', server: 'whois.verisign-grs.com' }]);
    });

    it('should include IDN suffixes on request', () => {
      expect(registry.servers({ includeIdn: true })).toEqual([
        { suffix: '.com', server: 'whois.verisign-grs.com' },
        { suffix: '.xn--p1ai', server: 'whois.tcinet.ru' },
      ]);
    });
  });

  describe('fromFile', () => {
    it('should load a JSON registry', () => {
      const file = writeTemp('zone.json', JSON.stringify({ '.test': 'whois.test.example', '.none': null }));
      const registry = TldRegistry.fromFile(file);

      expect(registry.size).toBe(2);
      expect(registry.lookup('.none')).toEqual({ status: 'no-server' });
    });

    it('should reject values that are not hostnames or null', () => {
      const file = writeTemp('bad.json', JSON.stringify({ '.test': 42 }));
      expect(() => TldRegistry.fromFile(file)).toThrow(RegistryError);
      expect(() => TldRegistry.fromFile(file)).toThrow(/at \.test/);
    });

    it('should wrap unreadable files', () => {
      const file = writeTemp('broken.json', '{ not json');
      expect(() => TldRegistry.fromFile(file)).toThrow(`Cannot read registry file ${file}`);
    });
  });

  describe('defaultRegistry', () => {
    it('should load the root zone table once', () => {
      const registry = defaultRegistry();
      expect(registry).toBe(defaultRegistry());
      expect(registry.size).toBe(750);
    });

    it('should map well-known suffixes', () => {
      const registry = defaultRegistry();
      expect(registry.lookup('.com')).toEqual({ status: 'server', server: 'whois.verisign-grs.com' });
      expect(registry.lookup('.net')).toEqual({ status: 'server', server: 'whois.verisign-grs.com' });
      expect(registry.lookup('.org')).toEqual({ status: 'server', server: 'whois.pir.org' });
      expect(registry.lookup('.ad')).toEqual({ status: 'no-server' });
    });

    it('should list 525 servers without IDN suffixes and 578 with them', () => {
      expect(defaultRegistry().servers()).toHaveLength(525);
      expect(defaultRegistry().servers({ includeIdn: true })).toHaveLength(578);
    });
  });
});
