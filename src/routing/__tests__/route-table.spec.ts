import { RouteTable } from '../route-table';

describe('RouteTable', () => {
  const web = { fqdn: 'app.example.com', targetAddress: '10.88.0.5', targetPort: 8080 };
  const api = { fqdn: 'api.example.com', targetAddress: '10.88.0.6', targetPort: 3000 };

  it('starts from a shared empty table', () => {
    expect(RouteTable.empty().size).toBe(0);
    expect(RouteTable.fromRoutes([])).toBe(RouteTable.empty());
  });

  it('looks routes up by hostname and lists them sorted', () => {
    const table = RouteTable.fromRoutes([web, api]);

    expect(table.size).toBe(2);
    expect(table.get('app.example.com')).toEqual(web);
    expect(table.has('api.example.com')).toBe(true);
    expect(table.get('missing.example.com')).toBeUndefined();
    expect(table.fqdns()).toEqual(['api.example.com', 'app.example.com']);
    expect(table.routes()).toEqual([api, web]);
  });

  it('rejects duplicate hostnames', () => {
    expect(() => RouteTable.fromRoutes([web, { ...web, targetPort: 9090 }])).toThrow(
      'Duplicate route for app.example.com',
    );
  });

  it('freezes the table and copies of its routes', () => {
    const input = { ...web };
    const table = RouteTable.fromRoutes([input]);
    input.targetPort = 1;

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.get('app.example.com'))).toBe(true);
    expect(table.get('app.example.com')?.targetPort).toBe(8080);
  });

  it('diffs added, changed and removed hostnames', () => {
    const before = RouteTable.fromRoutes([web, api]);
    const after = RouteTable.fromRoutes([
      { ...web, targetAddress: '10.88.0.9' },
      { fqdn: 'new.example.com', targetAddress: '10.88.0.7', targetPort: 80 },
    ]);

    expect(after.diff(before)).toEqual({
      added: ['new.example.com'],
      changed: ['app.example.com'],
      removed: ['api.example.com'],
    });
  });

  it('treats a port change as a change', () => {
    const before = RouteTable.fromRoutes([web]);
    const after = RouteTable.fromRoutes([{ ...web, targetPort: 8081 }]);

    expect(after.diff(before).changed).toEqual(['app.example.com']);
  });

  it('compares tables by value', () => {
    const a = RouteTable.fromRoutes([web, api]);
    const b = RouteTable.fromRoutes([{ ...api }, { ...web }]);

    expect(a.equals(b)).toBe(true);
    expect(a.equals(RouteTable.fromRoutes([web]))).toBe(false);
  });
});
