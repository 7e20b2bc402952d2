import { UnknownStateError } from '../../errors';
import type { State } from '../../types';

export const STATE_SEPARATOR = ':';

/**
 * Group name → member states in declared order.
 * Built once at startup and treated as read-only afterwards.
 */
export type StateRegistry = ReadonlyMap<string, readonly State[]>;

export interface StatesGroup<K extends string = string> {
  readonly name: string;
  /** Members in declared order. */
  readonly all: readonly State[];
  /** Member by local name. */
  get(localName: K): State;
}

export function createState(group: string, name: string | null = null): State {
  const state = name === null ? group : `${group}${STATE_SEPARATOR}${name}`;
  return Object.freeze({ group, name, state });
}

/**
 * Declares a group of states. The returned objects are the canonical instances
 * that `resolveState` hands back, so callers may compare them by identity.
 *
 * @example
 * const Main = defineStatesGroup('Main', ['start', 'confirm']);
 * Main.get('start').state; // "Main:start"
 */
export function defineStatesGroup<K extends string>(name: string, localNames: readonly K[]): StatesGroup<K> {
  if (name.includes(STATE_SEPARATOR)) {
    throw new Error(`States group name must not contain "${STATE_SEPARATOR}": ${name}`);
  }
  const byName = new Map<string, State>();
  for (const local of localNames) {
    if (byName.has(local)) {
      throw new Error(`State "${local}" is declared twice in group "${name}"`);
    }
    byName.set(local, createState(name, local));
  }
  const all = Object.freeze([...byName.values()]);
  return {
    name,
    all,
    get(localName: K): State {
      const state = byName.get(localName);
      if (!state) {
        throw new UnknownStateError(`Unknown state ${name}${STATE_SEPARATOR}${localName}`);
      }
      return state;
    },
  };
}

export function buildStateRegistry(groups: readonly StatesGroup[]): StateRegistry {
  const registry = new Map<string, readonly State[]>();
  for (const group of groups) {
    if (registry.has(group.name)) {
      throw new Error(`States group "${group.name}" is registered twice`);
    }
    registry.set(group.name, group.all);
  }
  return registry;
}

/**
 * Maps persisted state text back to the registered instance.
 * The group is everything before the first separator; the member must match the full text.
 */
export function resolveState(registry: StateRegistry, text: string): State {
  const [group] = text.split(STATE_SEPARATOR, 1);
  const members = registry.get(group);
  if (!members) {
    throw new UnknownStateError(`Unknown state group ${group}`);
  }
  const found = members.find((member) => member.state === text);
  if (!found) {
    throw new UnknownStateError(`Unknown state ${text}`);
  }
  return found;
}
