import type {Model, Name} from "./model"
import {PRIMARY_KEY} from "./model"
import {getEntity} from "./model.tools"
import {SqlBuilder, Statement} from "./sql"
import type {EntityRow, Storage, StorageTransaction} from "./storage"
import type {Value} from "./typeMapper"
import {toInt} from "./util"


export interface QueryResultLike {
    rows: Record<string, unknown>[]
    rowCount: number | null
}


/**
 * The part of `pg.PoolClient` we use
 */
export interface Connection {
    query(text: string, values?: unknown[]): Promise<QueryResultLike>
    escapeIdentifier(name: string): string
    /**
     * Passing an error makes the pool destroy the client instead of reusing it
     */
    release(err?: Error): void
}


/**
 * The part of `pg.Pool` we use
 */
export interface ConnectionPool {
    connect(): Promise<Connection>
}


export class PgStorage implements Storage {
    constructor(private pool: ConnectionPool, private model: Model) {}

    transact<T>(block: (tx: StorageTransaction) => Promise<T>): Promise<T> {
        return this.run(block)
    }

    /**
     * Creates missing tables, referenced ones first.
     */
    createTables(order: Name[]): Promise<void> {
        return this.run(async tx => {
            for (let name of order) {
                await tx.execute(tx.sql().createTable(name))
            }
        })
    }

    private async run<T>(block: (tx: PgTransaction) => Promise<T>): Promise<T> {
        let client = await this.pool.connect()
        let broken: Error | undefined
        try {
            await client.query('BEGIN')
            let result: T
            try {
                result = await block(new PgTransaction(client, this.model))
                await client.query('COMMIT')
            } catch(e: unknown) {
                try {
                    await client.query('ROLLBACK')
                } catch(rollbackError: unknown) {
                    // keep the original error, the pool drops the client
                    broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError))
                }
                throw e
            }
            return result
        } finally {
            client.release(broken)
        }
    }
}


export class PgTransaction implements StorageTransaction {
    constructor(private client: Connection, private model: Model) {}

    sql(): SqlBuilder {
        return new SqlBuilder(this.model, name => this.client.escapeIdentifier(name))
    }

    execute(statement: Statement): Promise<QueryResultLike> {
        return this.client.query(statement.sql, statement.params)
    }

    async merge(row: EntityRow): Promise<number> {
        let result = await this.execute(this.sql().merge(row))
        let key = result.rows[0]?.[PRIMARY_KEY]
        if (typeof key != 'number' && typeof key != 'string') {
            throw new Error(`No primary key returned for ${row.entity}`)
        }
        return toInt(key)
    }

    async get(entity: Name, key: number): Promise<EntityRow | undefined> {
        let result = await this.execute(this.sql().selectByKey(entity, key))
        let rec = result.rows[0]
        return rec && this.toRow(entity, rec)
    }

    async getAll(entity: Name): Promise<EntityRow[]> {
        let result = await this.execute(this.sql().selectAll(entity))
        return result.rows.map(rec => this.toRow(entity, rec))
    }

    async delete(entity: Name, key: number): Promise<boolean> {
        let result = await this.execute(this.sql().deleteByKey(entity, key))
        return (result.rowCount ?? 0) > 0
    }

    private toRow(entityName: Name, rec: Record<string, unknown>): EntityRow {
        let entity = getEntity(this.model, entityName)
        let fields: Record<Name, Value> = {}
        for (let name in entity.properties) {
            if (entity.properties[name].type.kind == 'list-relation') continue
            fields[name] = toValue(rec[name])
        }
        return {entity: entityName, fields}
    }
}


function toValue(value: unknown): Value {
    if (value == null) return null
    switch(typeof value) {
        case 'string':
        case 'number':
        case 'boolean':
            return value
        case 'bigint':
            return value.toString()
        default:
            if (value instanceof Date) return value.toISOString()
            if (Buffer.isBuffer(value)) return '0x' + value.toString('hex')
            return JSON.stringify(value)
    }
}
