import path from 'path';
import { PathMirror } from '../PathMirror';

describe('PathMirror', () => {
  const root = path.resolve('/proj');
  const mirror = new PathMirror({
    projectRoot: root,
    sourceRoot: path.join(root, 'src'),
    testRoot: path.join(root, 'tests'),
    fixtureRoot: path.join(root, 'tests', 'fixtures'),
    testPrefix: 'test_',
    fixtureSuffix: '_fixtures',
  });

  it('maps source files to test and fixture stubs', () => {
    expect(mirror.testPathFor('orders.py')).toBe(path.join(root, 'tests', 'test_orders.py'));
    expect(mirror.testPathFor('auth/dependencies.py')).toBe(path.join(root, 'tests', 'auth', 'test_dependencies.py'));
    expect(mirror.fixturePathFor('orders.py')).toBe(path.join(root, 'tests', 'fixtures', 'orders_fixtures.py'));
    expect(mirror.fixturePathFor('db/dao/review_dao.py')).toBe(path.join(root, 'tests', 'fixtures', 'db', 'dao', 'review_dao_fixtures.py'));
  });

  it('maps stub names back to their source', () => {
    expect(mirror.sourceForTest('auth/test_dependencies.py')).toBe('auth/dependencies.py');
    expect(mirror.sourceForFixture('orders_fixtures.py')).toBe('orders.py');
    expect(mirror.sourceForFixture('db/dao/review_dao_fixtures.py')).toBe('db/dao/review_dao.py');
  });

  it('is reversible for every source path', () => {
    for (const rel of ['main.py', 'auth/reset_password.py', 'controllers/routers/customer.py']) {
      const testRel = path.relative(path.join(root, 'tests'), mirror.testPathFor(rel)).split(path.sep).join('/');
      const fixtureRel = path.relative(path.join(root, 'tests', 'fixtures'), mirror.fixturePathFor(rel)).split(path.sep).join('/');
      expect(mirror.sourceForTest(testRel)).toBe(rel);
      expect(mirror.sourceForFixture(fixtureRel)).toBe(rel);
    }
  });

  it('rejects names outside the stub convention', () => {
    expect(mirror.sourceForTest('helpers.py')).toBeNull();
    expect(mirror.sourceForTest('test_.py')).toBeNull();
    expect(mirror.sourceForTest('test_orders.txt')).toBeNull();
    expect(mirror.sourceForFixture('orders.py')).toBeNull();
    expect(mirror.sourceForFixture('_fixtures.py')).toBeNull();
  });

  it('computes dotted module names relative to the project root', () => {
    expect(mirror.moduleName(path.join(root, 'src', 'auth', 'dependencies.py'))).toBe('src.auth.dependencies');
    expect(mirror.moduleName(path.join(root, 'tests', 'fixtures', 'orders_fixtures.py'))).toBe('tests.fixtures.orders_fixtures');
    expect(mirror.sourceModuleName('orders.py')).toBe('src.orders');
  });

  it('uses a bare module name when the source root is the project root', () => {
    const flat = new PathMirror({ ...mirror.layout, sourceRoot: root });
    expect(flat.sourceModuleName('orders.py')).toBe('orders');
  });

  it('refuses files outside the project root', () => {
    expect(() => mirror.moduleName(path.resolve('/elsewhere/orders.py'))).toThrow('is outside the project root');
  });
});
