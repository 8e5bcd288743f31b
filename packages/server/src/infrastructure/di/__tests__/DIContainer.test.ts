import { describe, it, expect } from 'vitest';
import { DIContainer } from '../DIContainer.js';

interface TestServices {
  Greeting: string;
  Counter: { count: number };
}

describe('DIContainer', () => {
  it('resolves what was registered', () => {
    const container = new DIContainer<TestServices>();
    const counter = { count: 1 };

    container.register('Greeting', 'hello');
    container.register('Counter', counter);

    expect(container.resolve('Greeting')).toBe('hello');
    expect(container.resolve('Counter')).toBe(counter);
  });

  it('throws for a missing service', () => {
    const container = new DIContainer<TestServices>();

    expect(() => container.resolve('Counter')).toThrow('Service not found: Counter');
  });
});
