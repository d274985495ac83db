import type { AggregatedUsage, Identity, UsageRecord } from "../types.js";

export function identityOf(pkg: { name: string; version: string }): Identity {
  return `${pkg.name}:${pkg.version}`;
}

/** Installs grouped by exact (name, version), in discovery order. */
export class UsageTable {
  private readonly byIdentity = new Map<Identity, UsageRecord[]>();
  private records = 0;

  add(record: UsageRecord): void {
    const id = identityOf(record);
    const existing = this.byIdentity.get(id);
    if (existing) {
      existing.push(record);
    } else {
      this.byIdentity.set(id, [record]);
    }
    this.records++;
  }

  merge(other: UsageTable): void {
    for (const records of other.byIdentity.values()) {
      for (const record of records) this.add(record);
    }
  }

  get(identity: Identity): readonly UsageRecord[] | undefined {
    return this.byIdentity.get(identity);
  }

  /** Number of distinct identities. */
  get size(): number {
    return this.byIdentity.size;
  }

  get recordCount(): number {
    return this.records;
  }

  toAggregates(): AggregatedUsage[] {
    const rows: AggregatedUsage[] = [];
    for (const records of this.byIdentity.values()) {
      const [first] = records;
      rows.push({
        name: first.name,
        version: first.version,
        records: [...records],
        sizeBytes: first.sizeBytes,
      });
    }
    return rows;
  }
}
