import { describe, expect, it } from 'vitest';
import { DialogStackEmptyError, DialogStackOverflowError } from '../errors';
import { createState } from '../modules/state';
import { MAX_STACK_DEPTH, Stack } from '.';

const start = createState('Main', 'start');

describe('Stack', () => {
  it('generates an id when none is given', () => {
    const stack = new Stack();
    expect(stack.id).toMatch(/^[0-9A-Za-z]{10}$/);
    expect(new Stack({ id: '' }).id).toBe('');
  });

  it('push creates a context bound to the stack', () => {
    const stack = new Stack({ id: 'main' });
    const context = stack.push(start, { source: 'menu' });

    expect(context).toEqual({
      id: context.id,
      stackId: 'main',
      state: start,
      startData: { source: 'menu' },
      dialogData: {},
      widgetData: {},
    });
    expect(stack.intents).toEqual([context.id]);
    expect(stack.last()).toBe(context.id);
  });

  it('pop removes the most recent intent', () => {
    const stack = new Stack({ intents: ['a', 'b'] });
    expect(stack.pop()).toBe('b');
    expect(stack.last()).toBe('a');
    expect(stack.pop()).toBe('a');
    expect(stack.empty()).toBe(true);
    expect(stack.last()).toBeNull();
  });

  it('pop on an empty stack throws', () => {
    expect(() => new Stack({ id: 'x' }).pop()).toThrow(DialogStackEmptyError);
  });

  it('refuses to grow past the maximum depth', () => {
    const stack = new Stack({ intents: Array.from({ length: MAX_STACK_DEPTH }, (_, i) => `i${i}`) });
    expect(() => stack.push(start)).toThrow(DialogStackOverflowError);
    expect(stack.intents).toHaveLength(MAX_STACK_DEPTH);
  });

  it('copies the initial intents', () => {
    const intents = ['a'];
    const stack = new Stack({ intents });
    stack.push(start);
    expect(intents).toEqual(['a']);
  });
});
