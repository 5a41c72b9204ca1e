import { type EpochDate, epochDateNow, toIsoDate } from '@metaeval/shared'
import type { ActiveAgentSet } from '@metaeval/types'
import type Database from 'better-sqlite3'
import type { ConnectionManager } from '../db/connection-manager'
import { BaseRepository } from './base-repository'

/**
 * Database active agent dto
 */
interface ActiveAgentDto {
  agent_name: string
  activated_at: string
}

/**
 * Persisted set of agents currently deployed for live decisions
 */
export class ActiveAgentRepository extends BaseRepository<ActiveAgentDto> implements ActiveAgentSet {
  protected readonly tableName = 'active_agents'

  constructor(connectionManager: ConnectionManager) {
    super(connectionManager)
  }

  async getActiveAgents(): Promise<readonly string[]> {
    const dtos = await this.findMany(undefined, [], 'activated_at ASC, agent_name ASC')
    return dtos.map(dto => dto.agent_name)
  }

  /**
   * Populate the set when it is empty. An existing set is left untouched.
   * @returns True when the set was seeded
   */
  async seed(agents: readonly string[], at: EpochDate = epochDateNow()): Promise<boolean> {
    return this.transaction((db) => {
      const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${this.tableName}`).get()
      if ((row?.count ?? 0) > 0) {
        return false
      }
      this.insertBatchSync(db, agents.map(agent => ({ agent_name: agent, activated_at: toIsoDate(at) })))
      return true
    })
  }

  /**
   * Replace one member with another inside an open transaction
   * @returns False when `fromAgent` is not active or `toAgent` already is
   */
  swapSync(db: Database.Database, fromAgent: string, toAgent: string, at: EpochDate): boolean {
    const isActive = db.prepare<[string], { agent_name: string }>(
      `SELECT agent_name FROM ${this.tableName} WHERE agent_name = ?`,
    )
    if (!isActive.get(fromAgent) || isActive.get(toAgent)) {
      return false
    }

    db.prepare(`DELETE FROM ${this.tableName} WHERE agent_name = ?`).run(fromAgent)
    db.prepare(`INSERT INTO ${this.tableName} (agent_name, activated_at) VALUES (?, ?)`)
      .run(toAgent, toIsoDate(at))
    return true
  }
}

