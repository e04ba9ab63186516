import type {Entity, Model, Name} from "./model"
import {PRIMARY_KEY} from "./model"
import {findEntityByTable, getEntity, isCascading} from "./model.tools"
import {getSqlType} from "./scalars"
import type {EntityRow} from "./storage"
import type {Value} from "./typeMapper"
import {toColumn, unsupportedCase} from "./util"


export interface Statement {
    sql: string
    params: Value[]
}


export class SqlBuilder {
    private params: Value[] = []

    constructor(
        private model: Model,
        private ident: (name: string) => string
    ) {}

    private param(value: Value): string {
        return '$' + this.params.push(value)
    }

    private statement(sql: string): Statement {
        return {sql, params: this.params}
    }

    /**
     * INSERT for rows without a key, INSERT .. ON CONFLICT DO UPDATE otherwise
     */
    merge(row: EntityRow): Statement {
        let entity = getEntity(this.model, row.entity)
        let key = row.fields[PRIMARY_KEY]
        let columns: string[] = []
        let values: string[] = []
        for (let name in row.fields) {
            if (name == PRIMARY_KEY && key == null) continue
            let prop = entity.properties[name]
            if (prop == null || prop.type.kind == 'list-relation') continue
            columns.push(this.ident(prop.column ?? toColumn(name)))
            values.push(this.param(row.fields[name]))
        }

        let table = this.ident(entity.table)
        let pk = this.ident(toColumn(PRIMARY_KEY))
        let out = columns.length > 0
            ? `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${values.join(', ')})`
            : `INSERT INTO ${table} DEFAULT VALUES`

        if (key != null) {
            let updates = columns.filter(c => c != pk).map(c => `${c} = EXCLUDED.${c}`)
            if (updates.length == 0) {
                updates.push(`${pk} = EXCLUDED.${pk}`)
            }
            out += ` ON CONFLICT (${pk}) DO UPDATE SET ${updates.join(', ')}`
        }

        out += ` RETURNING ${pk}`
        return this.statement(out)
    }

    selectAll(entityName: Name): Statement {
        let entity = getEntity(this.model, entityName)
        return this.statement(
            `${this.select(entity)} ORDER BY ${this.ident(toColumn(PRIMARY_KEY))}`
        )
    }

    selectByKey(entityName: Name, key: number): Statement {
        let entity = getEntity(this.model, entityName)
        return this.statement(
            `${this.select(entity)} WHERE ${this.ident(toColumn(PRIMARY_KEY))} = ${this.param(key)}`
        )
    }

    deleteByKey(entityName: Name, key: number): Statement {
        let entity = getEntity(this.model, entityName)
        return this.statement(
            `DELETE FROM ${this.ident(entity.table)} WHERE ${this.ident(toColumn(PRIMARY_KEY))} = ${this.param(key)}`
        )
    }

    createTable(entityName: Name): Statement {
        let entity = getEntity(this.model, entityName)
        let defs: string[] = []
        for (let name in entity.properties) {
            let prop = entity.properties[name]
            let column = this.ident(prop.column ?? toColumn(name))
            switch(prop.type.kind) {
                case 'scalar':
                    if (name == PRIMARY_KEY) {
                        defs.push(`${column} serial PRIMARY KEY`)
                    } else {
                        defs.push(`${column} ${getSqlType(prop.type.name, prop.maxLength)}${prop.nullable ? '' : ' NOT NULL'}`)
                    }
                    break
                case 'fk': {
                    let def = `${column} integer${prop.nullable ? '' : ' NOT NULL'}`
                    let target = findEntityByTable(this.model, prop.type.table)
                    if (target) {
                        def += ` REFERENCES ${this.ident(prop.type.table)} (${this.ident(toColumn(PRIMARY_KEY))})`
                        if (isCascading(this.model, entityName, name)) {
                            def += ' ON DELETE CASCADE'
                        }
                    }
                    defs.push(def)
                    break
                }
                case 'list-relation':
                    break
                default:
                    throw unsupportedCase(name)
            }
        }
        return this.statement(
            `CREATE TABLE IF NOT EXISTS ${this.ident(entity.table)} (${defs.join(', ')})`
        )
    }

    private select(entity: Entity): string {
        let columns: string[] = []
        for (let name in entity.properties) {
            let prop = entity.properties[name]
            if (prop.type.kind == 'list-relation') continue
            columns.push(`${this.ident(prop.column ?? toColumn(name))} AS ${this.ident(name)}`)
        }
        return `SELECT ${columns.join(', ')} FROM ${this.ident(entity.table)}`
    }
}
