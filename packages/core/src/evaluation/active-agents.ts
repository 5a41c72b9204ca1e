import type { ActiveAgentSet } from '@metaeval/types'

/**
 * Fixed in-memory active set
 */
export class StaticActiveAgentSet implements ActiveAgentSet {
  private readonly agents: readonly string[]

  constructor(agents: readonly string[]) {
    this.agents = [...agents]
  }

  async getActiveAgents(): Promise<readonly string[]> {
    return this.agents
  }
}
