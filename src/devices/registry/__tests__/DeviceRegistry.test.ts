import { ALL_GROUP, DeviceRegistry, RegistrySource } from '../DeviceRegistry';
import { GroupResolver, describeTarget } from '../GroupResolver';
import { ConfigurationError, ResolutionError } from '../../../core/errors/DeviceError';

const source: RegistrySource = {
  devices: [
    { id: 'Left', host: '10.0.0.1', groups: ['front'], aliases: ['stage-left'] },
    { id: 'right', host: '10.0.0.2', port: 4353, groups: ['Front'] },
    { id: 'rear', host: '10.0.0.3', name: 'Rear fill', groups: ['rear'], location: 'balcony' }
  ],
  aliases: { L: 'left', r: 'RIGHT' }
};

function issuesOf(bad: RegistrySource): string[] {
  try {
    DeviceRegistry.fromSource(bad);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('DeviceRegistry', () => {
  let registry: DeviceRegistry;

  beforeEach(() => {
    registry = DeviceRegistry.fromSource(source);
  });

  test('should resolve nicknames and aliases case-insensitively', () => {
    expect(registry.resolve('LEFT').id).toBe('left');
    expect(registry.resolve('Stage-Left').id).toBe('left');
    expect(registry.resolve('l').id).toBe('left');
    expect(registry.resolve(' R ').id).toBe('right');
  });

  test('should fill in defaults', () => {
    const left = registry.resolve('left');
    expect(left.address).toEqual({ host: '10.0.0.1', port: 4352 });
    expect(left.name).toBe('Left');
    expect(registry.resolve('right').address.port).toBe(4353);
    expect(registry.resolve('rear').name).toBe('Rear fill');
    expect(registry.resolve('rear').location).toBe('balcony');
  });

  test('should throw ResolutionError for unknown names', () => {
    expect(() => registry.resolve('ceiling')).toThrow(ResolutionError);
    expect(() => registry.resolve('ceiling')).toThrow('Unknown device "ceiling"');
    expect(registry.find('ceiling')).toBeUndefined();
  });

  test('should keep registration order', () => {
    expect(registry.list().map(device => device.id)).toEqual(['left', 'right', 'rear']);
    expect(registry.size).toBe(3);
  });

  test('should index groups and the implicit all group', () => {
    expect(registry.groupNames()).toEqual(['all', 'front', 'rear']);
    expect(registry.groupMembers('FRONT').map(device => device.id)).toEqual(['left', 'right']);
    expect(registry.groupMembers(ALL_GROUP).map(device => device.id)).toEqual(['left', 'right', 'rear']);
    expect(registry.hasGroup('rear')).toBe(true);
    expect(() => registry.groupMembers('ceiling')).toThrow('Unknown group "ceiling"');
  });

  test('should provide all even for a registry without groups', () => {
    const plain = DeviceRegistry.fromSource({ devices: [{ id: 'solo', host: 'localhost' }] });
    expect(plain.groupNames()).toEqual(['all']);
    expect(plain.groupMembers('all').map(device => device.id)).toEqual(['solo']);
  });

  test('should freeze descriptors', () => {
    expect(Object.isFrozen(registry.resolve('left'))).toBe(true);
    expect(Object.isFrozen(registry.resolve('left').address)).toBe(true);
  });

  describe('load-time conflicts', () => {
    test('should reject duplicate nicknames', () => {
      expect(issuesOf({ devices: [{ id: 'a', host: 'h1' }, { id: 'A', host: 'h2' }] })).toEqual([
        'devices[1]: duplicate nickname "a"'
      ]);
    });

    test('should reject an alias that points to two devices', () => {
      expect(issuesOf({
        devices: [
          { id: 'a', host: 'h1', aliases: ['x'] },
          { id: 'b', host: 'h2', aliases: ['x'] }
        ]
      })).toEqual(['devices.b.aliases: alias "x" points to both "a" and "b"']);
    });

    test('should reject an alias equal to another nickname', () => {
      expect(issuesOf({
        devices: [
          { id: 'a', host: 'h1', aliases: ['b'] },
          { id: 'b', host: 'h2' }
        ]
      })).toEqual(['devices.a.aliases: alias "b" is already the nickname of another device']);
    });

    test('should reject aliases for unknown devices', () => {
      expect(issuesOf({ devices: [{ id: 'a', host: 'h1' }], aliases: { z: 'zed' } })).toEqual([
        'aliases.z: unknown device "zed"'
      ]);
    });

    test('should reject empty fields and bad ports, reporting every issue', () => {
      expect(issuesOf({
        devices: [
          { id: ' ', host: 'h1' },
          { id: 'a', host: '' },
          { id: 'b', host: 'h2', port: 70000 }
        ]
      })).toEqual([
        'devices[0]: nickname is empty',
        'devices[1] (a): host is empty',
        'devices[2] (b): port 70000 is out of range'
      ]);
    });

    test('should accept the same alias declared twice for one device', () => {
      const twice = DeviceRegistry.fromSource({
        devices: [{ id: 'a', host: 'h1', aliases: ['x'] }],
        aliases: { X: 'a' }
      });
      expect(twice.resolve('x').id).toBe('a');
    });
  });
});

describe('GroupResolver', () => {
  const registry = DeviceRegistry.fromSource(source);
  const resolver = new GroupResolver(registry);
  const ids = (target: Parameters<GroupResolver['resolveTarget']>[0]) =>
    resolver.resolveTarget(target).map(device => device.id);

  test('should expand groups in registration order', () => {
    expect(ids({ group: 'front' })).toEqual(['left', 'right']);
    expect(ids({ group: 'all' })).toEqual(['left', 'right', 'rear']);
  });

  test('should order and deduplicate explicit lists', () => {
    expect(ids({ devices: ['rear', 'l', 'left', 'R'] })).toEqual(['left', 'right', 'rear']);
  });

  test('should be deterministic', () => {
    const target = { devices: ['rear', 'stage-left'] };
    expect(ids(target)).toEqual(ids(target));
    expect(ids(target)).toEqual(['left', 'rear']);
  });

  test('should reject unknown names, unknown groups and empty lists', () => {
    expect(() => resolver.resolveTarget({ devices: ['left', 'ghost'] })).toThrow(ResolutionError);
    expect(() => resolver.resolveTarget({ group: 'ghosts' })).toThrow(ResolutionError);
    expect(() => resolver.resolveTarget({ devices: [] })).toThrow('No devices given');
  });

  test('should describe targets for logs', () => {
    expect(describeTarget({ group: 'Front' })).toBe('group:front');
    expect(describeTarget({ devices: ['Left', 'r'] })).toBe('devices:left,r');
  });
});
