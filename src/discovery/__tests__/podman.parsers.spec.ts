import { parseContainerList, selectAddress, isValidContainerId } from '../podman/podman.parsers';

describe('parseContainerList', () => {
  it('parses tab-separated container lines', () => {
    const output = 'abc123\t/web\t8080\tApp.Example.com \n' + 'def456\tapi\t3000\tapi.example.com\n';

    expect(parseContainerList(output)).toEqual({
      backends: [
        { id: 'abc123', name: 'web', fqdn: 'app.example.com', port: 8080 },
        { id: 'def456', name: 'api', fqdn: 'api.example.com', port: 3000 },
      ],
      rejected: [],
    });
  });

  it('ignores blank lines and carriage returns', () => {
    const result = parseContainerList('\r\nabc123\tweb\t80\tapp.example.com\r\n\n');

    expect(result.backends).toEqual([{ id: 'abc123', name: 'web', fqdn: 'app.example.com', port: 80 }]);
    expect(result.rejected).toEqual([]);
  });

  it('rejects lines with too few fields', () => {
    const result = parseContainerList('abc123\tweb\t8080');

    expect(result.backends).toEqual([]);
    expect(result.rejected).toEqual([{ line: 'abc123\tweb\t8080', reason: 'expected 4 tab-separated fields' }]);
  });

  it('rejects lines with an empty field', () => {
    const result = parseContainerList('abc123\t\t8080\tapp.example.com');

    expect(result.rejected[0].reason).toBe('missing required field');
  });

  it.each(['0', '65536', 'http', '80a'])('rejects exposed-port %p', (port) => {
    const result = parseContainerList(`abc123\tweb\t${port}\tapp.example.com`);

    expect(result.backends).toEqual([]);
    expect(result.rejected[0].reason).toBe(`invalid exposed-port "${port}"`);
  });

  it('keeps extra tabs in the hostname field, where they fail validation', () => {
    const result = parseContainerList('abc123\tweb\t8080\tapp.example.com\textra');

    expect(result.backends).toEqual([]);
    expect(result.rejected[0].reason).toBe('invalid exposed-fqdn "app.example.com\textra"');
  });

  it('normalizes a fully-qualified hostname with a trailing dot', () => {
    const result = parseContainerList('abc123\tweb\t8080\tApp.Example.com.');

    expect(result.backends).toEqual([{ id: 'abc123', name: 'web', fqdn: 'app.example.com', port: 8080 }]);
    expect(result.rejected).toEqual([]);
  });

  it.each(['localhost', 'app..example.com', 'a_b.example.com', '../etc.example.com', 'app.example.com..'])(
    'rejects exposed-fqdn %p',
    (fqdn) => {
      const result = parseContainerList(`abc123\tweb\t8080\t${fqdn}`);

      expect(result.backends).toEqual([]);
      expect(result.rejected).toHaveLength(1);
      expect(result.rejected[0].reason).toMatch(/^invalid exposed-fqdn /);
    },
  );

  it('rejects container ids with shell metacharacters', () => {
    const result = parseContainerList('abc;rm\tweb\t8080\tapp.example.com');

    expect(result.rejected[0].reason).toBe('invalid container id "abc;rm"');
  });

  it('keeps valid lines when others are rejected', () => {
    const result = parseContainerList('bad line\nabc123\tweb\t8080\tapp.example.com');

    expect(result.backends).toHaveLength(1);
    expect(result.rejected).toHaveLength(1);
  });
});

describe('selectAddress', () => {
  it('picks the address of the lowest-sorted network name', () => {
    expect(
      selectAddress({
        podman: { IPAddress: '10.88.0.5' },
        backend: { IPAddress: '10.89.0.7' },
        zeta: { IPAddress: '10.90.0.2' },
      }),
    ).toBe('10.89.0.7');
  });

  it('skips networks without an address', () => {
    expect(
      selectAddress({
        aaa: { IPAddress: '' },
        bbb: null,
        ccc: { IPAddress: ' 10.88.0.9 ' },
      }),
    ).toBe('10.88.0.9');
  });

  it('returns undefined when no network has an address', () => {
    expect(selectAddress({ podman: { IPAddress: '' } })).toBeUndefined();
    expect(selectAddress(undefined)).toBeUndefined();
  });
});

describe('isValidContainerId', () => {
  it('accepts hex ids and names', () => {
    expect(isValidContainerId('3f9a0c1b')).toBe(true);
    expect(isValidContainerId('web_app-1.blue')).toBe(true);
  });

  it('rejects empty ids and whitespace', () => {
    expect(isValidContainerId('')).toBe(false);
    expect(isValidContainerId('abc def')).toBe(false);
  });
});
