/**
 * Per-solution deploy state machine
 *
 *   not-staged → staged → upgraded → processes-activated → published
 *   not-staged → skipped
 *
 * States only move forward. A run interrupted part way leaves each solution
 * in the last state it reached; re-running the whole deploy is the recovery.
 */

import { InvalidTransitionError } from '../lib/errors.js'

export type SolutionDeployState =
  | 'not-staged'
  | 'staged'
  | 'upgraded'
  | 'processes-activated'
  | 'published'
  | 'skipped'

const TRANSITIONS: Record<SolutionDeployState, readonly SolutionDeployState[]> = {
  'not-staged': ['staged', 'skipped'],
  staged: ['upgraded'],
  upgraded: ['processes-activated'],
  'processes-activated': ['published'],
  published: [],
  skipped: []
}

export function canTransition(from: SolutionDeployState, to: SolutionDeployState): boolean {
  return TRANSITIONS[from].includes(to)
}

export function isTerminal(state: SolutionDeployState): boolean {
  return TRANSITIONS[state].length === 0
}

/**
 * Tracks the state of every solution of one deploy run
 */
export class DeployStateTracker {
  private readonly states = new Map<string, SolutionDeployState>()

  constructor(solutions: readonly string[]) {
    for (const name of solutions) {
      this.states.set(name, 'not-staged')
    }
  }

  get(solution: string): SolutionDeployState {
    const state = this.states.get(solution)
    if (!state) {
      throw new InvalidTransitionError(solution, 'unknown', 'any state')
    }
    return state
  }

  advance(solution: string, to: SolutionDeployState): void {
    const from = this.get(solution)
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(solution, from, to)
    }
    this.states.set(solution, to)
  }

  /** Copy of all states in insertion (manifest) order */
  snapshot(): Record<string, SolutionDeployState> {
    return Object.fromEntries(this.states)
  }
}
