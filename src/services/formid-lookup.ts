/**
 * FormIdLookupService - record descriptions from one or more MySQL sources.
 *
 * Each source holds a table named after the game with (formid, plugin, entry)
 * rows. Sources are tried in order; hits and misses are cached for the
 * session, query errors are logged and read as "not found".
 */
import * as mysql from "mysql2/promise";
import type { Pool } from "mysql2/promise";
import { logger, type FormIdDbConfig } from "../utils/index.js";
import type { FormIdLookup } from "./formid-correlator.js";
import type { Row } from "./shared.js";

const TABLE_NAME = /^[A-Za-z0-9_]+$/;

export class FormIdLookupService implements FormIdLookup {
  private readonly cache = new Map<string, string | null>();
  private readonly sql: string;

  constructor(private readonly pools: Pool[], table: string) {
    if (!TABLE_NAME.test(table)) throw new Error(`Invalid FormID table name: ${table}`);
    this.sql = `SELECT entry FROM \`${table}\` WHERE formid = ? AND LOWER(plugin) = LOWER(?) LIMIT 1`;
  }

  /** Null when no source is configured; FormID values are then never shown */
  static fromConfig(config: FormIdDbConfig, gameName: string): FormIdLookupService | null {
    if (!config.uris.length) return null;
    const pools = config.uris.map(uri => mysql.createPool({ uri, connectionLimit: config.connectionLimit }));
    logger.info(`FormID lookup: ${pools.length} source(s)`, { module: "FormID" });
    return new FormIdLookupService(pools, config.table || gameName);
  }

  get sourceCount(): number {
    return this.pools.length;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  async lookup(formId: string, plugin: string): Promise<string | undefined> {
    const key = `${formId}|${plugin.toLowerCase()}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached ?? undefined;

    let failed = false;
    for (const pool of this.pools) {
      try {
        const [rows] = await pool.execute<Row[]>(this.sql, [formId, plugin]);
        const entry = rows[0]?.entry;
        if (typeof entry === "string" && entry) {
          this.cache.set(key, entry);
          return entry;
        }
      } catch (e) {
        failed = true;
        logger.warn(`Lookup of ${formId} in ${plugin} failed: ${(e as Error).message}`, { module: "FormID" });
      }
    }
    if (!failed) this.cache.set(key, null);
    return undefined;
  }

  async close(): Promise<void> {
    await Promise.all(this.pools.map(pool => pool.end()));
  }
}
