import {expect} from "expect"
import {createApp} from "../app"
import {parseModel} from "../tools"
import type {Connection, ConnectionPool, QueryResultLike} from "../transaction"
import {PgStorage} from "../transaction"
import {SHOP_SCHEMA} from "./util/setup"


type Reply = QueryResultLike | Error


class RecordingConnection implements Connection {
    public queries: string[] = []
    public params: unknown[][] = []
    public released = 0
    public releasedWith: (Error | undefined)[] = []
    public failRollback = false

    constructor(private replies: Reply[]) {}

    async query(text: string, values?: unknown[]): Promise<QueryResultLike> {
        this.queries.push(text)
        if (text == 'ROLLBACK' && this.failRollback) {
            throw new Error('connection terminated')
        }
        if (text == 'BEGIN' || text == 'COMMIT' || text == 'ROLLBACK') {
            return {rows: [], rowCount: null}
        }
        this.params.push(values || [])
        let reply = this.replies.shift()
        if (reply == null) throw new Error(`unexpected query: ${text}`)
        if (reply instanceof Error) throw reply
        return reply
    }

    escapeIdentifier(name: string): string {
        return `"${name}"`
    }

    release(err?: Error): void {
        this.released += 1
        this.releasedWith.push(err)
    }
}


class RecordingPool implements ConnectionPool {
    public connection: RecordingConnection

    constructor(replies: Reply[]) {
        this.connection = new RecordingConnection(replies)
    }

    async connect(): Promise<Connection> {
        return this.connection
    }
}


describe('pg storage', function() {
    let model = parseModel(SHOP_SCHEMA)

    function setup(replies: Reply[]) {
        let pool = new RecordingPool(replies)
        let storage = new PgStorage(pool, model)
        let app = createApp({model, storage})
        return {...app, storage, connection: pool.connection}
    }

    it('inserts within a transaction', async function() {
        let {factory, repository, connection} = setup([
            {rows: [{id: '7'}], rowCount: 1}
        ])
        let o = factory.viewModelType('Order').create({productId: 1, quantity: 3})
        await repository.save([o])
        expect(o.get('id')).toEqual(7)
        expect(connection.queries).toEqual([
            'BEGIN',
            'INSERT INTO "orders" ("product_id", "quantity") VALUES ($1, $2) RETURNING "id"',
            'COMMIT'
        ])
        expect(connection.params).toEqual([[1, 3]])
        expect(connection.released).toEqual(1)
        expect(connection.releasedWith).toEqual([undefined])
    })

    it('rolls back on failure', async function() {
        let {factory, repository, connection} = setup([
            new Error('insert or update on table "orders" violates foreign key constraint')
        ])
        let o = factory.viewModelType('Order').create({productId: 9, quantity: 3})
        await expect(repository.save([o])).rejects.toThrow('violates foreign key constraint')
        expect(o.isPending()).toBe(true)
        expect(connection.queries[0]).toEqual('BEGIN')
        expect(connection.queries[2]).toEqual('ROLLBACK')
        expect(connection.queries.length).toEqual(3)
        expect(connection.released).toEqual(1)
    })

    it('keeps the original error when rollback fails', async function() {
        let {factory, repository, connection} = setup([
            new Error('insert or update on table "orders" violates foreign key constraint')
        ])
        connection.failRollback = true
        let o = factory.viewModelType('Order').create({productId: 9, quantity: 3})
        await expect(repository.save([o])).rejects.toThrow(
            'insert or update on table "orders" violates foreign key constraint'
        )
        expect(connection.queries[2]).toEqual('ROLLBACK')
        expect(connection.releasedWith.length).toEqual(1)
        expect(connection.releasedWith[0]?.message).toEqual('connection terminated')
    })

    it('fails when no key is returned', async function() {
        let {factory, repository, connection} = setup([
            {rows: [], rowCount: 0}
        ])
        await expect(repository.save([factory.viewModelType('Product').create()])).rejects.toThrow(
            'No primary key returned for Product'
        )
        expect(connection.queries[2]).toEqual('ROLLBACK')
    })

    it('reads rows', async function() {
        let {factory, repository} = setup([
            {rows: [{id: 1, productId: 2, quantity: 3}, {id: 2, productId: 2, quantity: 1}], rowCount: 2}
        ])
        let orders = await repository.fetchAll(factory.viewModelType('Order'))
        expect(orders.map(vm => vm.toEntity())).toEqual([
            {entity: 'Order', fields: {id: 1, productId: 2, quantity: 3}},
            {entity: 'Order', fields: {id: 2, productId: 2, quantity: 1}}
        ])
    })

    it('deletes rows found by key', async function() {
        let {factory, repository, connection} = setup([
            {rows: [{id: 3, productId: 1, quantity: 1}], rowCount: 1},
            {rows: [], rowCount: 1},
            {rows: [], rowCount: 0}
        ])
        let Order = factory.viewModelType('Order')
        await repository.delete([
            Order.fromEntity({entity: 'Order', fields: {id: 3}}),
            Order.fromEntity({entity: 'Order', fields: {id: 4}})
        ])
        expect(connection.queries).toEqual([
            'BEGIN',
            'SELECT "id" AS "id", "product_id" AS "productId", "quantity" AS "quantity" FROM "orders" WHERE "id" = $1',
            'DELETE FROM "orders" WHERE "id" = $1',
            'SELECT "id" AS "id", "product_id" AS "productId", "quantity" AS "quantity" FROM "orders" WHERE "id" = $1',
            'COMMIT'
        ])
        expect(connection.params).toEqual([[3], [3], [4]])
    })

    it('creates tables in the given order', async function() {
        let {storage, connection} = setup([
            {rows: [], rowCount: null},
            {rows: [], rowCount: null}
        ])
        await storage.createTables(['Product', 'Order'])
        expect(connection.queries.length).toEqual(4)
        expect(connection.queries[1]).toMatch(/^CREATE TABLE IF NOT EXISTS "products" /)
        expect(connection.queries[2]).toMatch(/^CREATE TABLE IF NOT EXISTS "orders" /)
        expect(connection.queries[3]).toEqual('COMMIT')
    })
})
