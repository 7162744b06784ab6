import { ProcessedMessageRegistry } from '../src/services/processed-message.registry';

describe('ProcessedMessageRegistry', () => {
  it('remembers added ids', () => {
    const registry = new ProcessedMessageRegistry(10);
    registry.add('A');

    expect(registry.has('A')).toBe(true);
    expect(registry.has('B')).toBe(false);
  });

  it('evicts the oldest id once over capacity', () => {
    const registry = new ProcessedMessageRegistry(2);
    registry.add('A');
    registry.add('B');
    registry.add('C');

    expect(registry.has('A')).toBe(false);
    expect(registry.has('B')).toBe(true);
    expect(registry.has('C')).toBe(true);
    expect(registry.size).toBe(2);
  });

  it('does not evict when an existing id is added again', () => {
    const registry = new ProcessedMessageRegistry(2);
    registry.add('A');
    registry.add('B');
    registry.add('A');

    expect(registry.has('A')).toBe(true);
    expect(registry.has('B')).toBe(true);
    expect(registry.size).toBe(2);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new ProcessedMessageRegistry(0)).toThrow('Processed message capacity must be a positive integer, got 0');
  });
});
