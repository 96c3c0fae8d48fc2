import { OperationRegistry } from 'gizmograph';
import { constantOperation } from './utils/test-operations';

describe('OperationRegistry', () => {
  it('should register and resolve operations by name', () => {
    const add = constantOperation('Add', { sum: 0 });
    const registry = new OperationRegistry([add]);

    expect(registry.get('Add')).toBe(add);
    expect(registry.has('Add')).toBe(true);
    expect(registry.get('Sub')).toBeUndefined();
    expect(registry.has('Sub')).toBe(false);
  });

  it('should reject a second operation with the same name', () => {
    const registry = new OperationRegistry();
    registry.register(constantOperation('Add', {}));

    expect(() => registry.register(constantOperation('Add', {}))).toThrow(
      "Operation 'Add' is already registered"
    );
  });

  it('should list and clear registered names', () => {
    const registry = new OperationRegistry([constantOperation('A', {}), constantOperation('B', {})]);

    expect([...registry.getOperationNames()]).toEqual(['A', 'B']);
    expect(registry.size).toBe(2);

    registry.clear();

    expect(registry.size).toBe(0);
  });
});
