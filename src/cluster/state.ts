import { EventEmitter } from 'events';

export type BootstrapState = 'engine-absent' | 'engine-ready' | 'cluster-member';

const ORDER: Record<BootstrapState, number> = {
  'engine-absent': 0,
  'engine-ready': 1,
  'cluster-member': 2,
};

export interface StateChange {
  host: string;
  from: BootstrapState;
  to: BootstrapState;
}

/**
 * Per-run bootstrap state of every host. States only move forward; `reset`
 * is the one way back and is used when a worker leaves a foreign swarm.
 */
export class NodeStateTracker extends EventEmitter {
  private states: Map<string, BootstrapState> = new Map();

  constructor(hosts: readonly string[]) {
    super();
    for (const host of hosts) {
      this.states.set(host, 'engine-absent');
    }
  }

  get(host: string): BootstrapState {
    const state = this.states.get(host);
    if (!state) {
      throw new Error(`Unknown host: ${host}`);
    }
    return state;
  }

  advance(host: string, to: BootstrapState): void {
    const from = this.get(host);
    if (ORDER[to] < ORDER[from]) {
      throw new Error(`Illegal bootstrap transition for ${host}: ${from} -> ${to}`);
    }
    if (from === to) return;
    this.states.set(host, to);
    this.emit('stateChange', { host, from, to } satisfies StateChange);
  }

  /** Leave-and-rejoin: a cluster member drops back to engine-ready. */
  reset(host: string): void {
    const from = this.get(host);
    if (from !== 'cluster-member') return;
    this.states.set(host, 'engine-ready');
    this.emit('stateChange', { host, from, to: 'engine-ready' } satisfies StateChange);
  }

  snapshot(): Record<string, BootstrapState> {
    return Object.fromEntries(this.states);
  }

  allAtLeast(state: BootstrapState): boolean {
    return [...this.states.values()].every(s => ORDER[s] >= ORDER[state]);
  }
}
