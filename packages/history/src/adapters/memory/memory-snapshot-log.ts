import type { SnapshotLog } from "../../ports/snapshot-log"

/** In-process snapshot log for tests. */
export class MemorySnapshotLog implements SnapshotLog {
  readonly location: string
  readonly quarantined: string[][] = []
  private lines: string[]

  constructor(lines: readonly string[] = [], location = "memory:history") {
    this.lines = [...lines]
    this.location = location
  }

  async readLines(): Promise<string[]> {
    return [...this.lines]
  }

  async append(line: string): Promise<void> {
    this.lines.push(line)
  }

  async rewrite(lines: readonly string[]): Promise<void> {
    this.lines = [...lines]
  }

  async quarantine(lines: readonly string[]): Promise<string> {
    this.quarantined.push([...lines])
    return `${this.location}#quarantine-${this.quarantined.length}`
  }
}
