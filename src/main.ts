#!/usr/bin/env node

import {Pool, PoolConfig} from "pg"
import {createApp} from "./app"
import type {Model} from "./model"
import {sortByReferences} from "./model.tools"
import {StockSummary} from "./summary"
import {loadModel} from "./tools"
import {PgStorage} from "./transaction"


async function main(): Promise<void> {
    let args = process.argv.slice(2)

    if (args.indexOf('--help') >= 0 || args.length < 2) {
        help()
        process.exit(1)
    }

    let model = loadModel(args[0])
    let db = new Pool(readDbConfig())
    try {
        await run(model, new PgStorage(db, model), args[1], args.slice(2))
    } finally {
        await db.end()
    }
}


async function run(model: Model, storage: PgStorage, command: string, args: string[]): Promise<void> {
    let app = createApp({model, storage})
    switch(command) {
        case 'init': {
            let order = sortByReferences(model)
            await storage.createTables(order)
            console.log('Tables are ready: ' + order.map(name => model[name].table).join(', '))
            break
        }
        case 'list': {
            if (args.length != 1) return usageError()
            let type = app.factory.viewModelType(args[0])
            let fields = type.descriptor.fields.map(f => f.name)
            console.log(fields.join('\t'))
            for (let vm of await app.repository.fetchAll(type)) {
                console.log(fields.map(f => String(vm.get(f))).join('\t'))
            }
            break
        }
        case 'summary': {
            if (args.length != 2) return usageError()
            let summary = new StockSummary(app.repository, app.factory, {
                parent: args[0],
                dependent: args[1]
            })
            for (let line of await summary.refresh()) {
                console.log(line.label)
            }
            break
        }
        default:
            usageError()
    }
}


export function readDbConfig(): PoolConfig {
    let db: PoolConfig = {}
    if (process.env.DB_HOST) {
        db.host = process.env.DB_HOST
    }
    if (process.env.DB_PORT) {
        db.port = parseInt(process.env.DB_PORT)
    }
    if (process.env.DB_NAME) {
        db.database = process.env.DB_NAME
    }
    if (process.env.DB_USER) {
        db.user = process.env.DB_USER
    }
    if (process.env.DB_PASS) {
        db.password = process.env.DB_PASS
    }
    return db
}


function usageError(): void {
    help()
    process.exitCode = 1
}


function help() {
    console.error(`
Usage:  viewsync SCHEMA COMMAND [ARGS]

Commands:

    init                        create missing tables
    list ENTITY                 print all rows of ENTITY
    summary PARENT DEPENDENT    print what is left of PARENT rows after DEPENDENT ones

Database connection can be configured using environment variables:

    DB_NAME
    DB_USER
    DB_PASS
    DB_HOST
    DB_PORT
`)
}


if (require.main === module) {
    main().catch(err => {
        console.error(err)
        process.exit(1)
    })
}
