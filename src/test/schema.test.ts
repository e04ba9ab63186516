import {expect} from "expect"
import path from "path"
import {sortByReferences} from "../model.tools"
import {loadModel, parseModel} from "../tools"
import {SHOP_SCHEMA} from "./util/setup"


describe('schema', function() {
    describe('entities', function() {
        let model = parseModel(SHOP_SCHEMA)

        it('are built for @entity types only', function() {
            expect(Object.keys(model).sort()).toEqual(['Order', 'Product'])
        })

        it('carry scalar and foreign key properties', function() {
            expect(model.Order).toEqual({
                kind: 'entity',
                table: 'orders',
                properties: {
                    id: {type: {kind: 'scalar', name: 'ID'}, nullable: false, column: 'id'},
                    productId: {type: {kind: 'fk', table: 'products'}, nullable: false, column: 'product_id'},
                    quantity: {type: {kind: 'scalar', name: 'Int'}, nullable: false, column: 'quantity'}
                }
            })
        })

        it('carry string lengths and back references', function() {
            expect(model.Product.properties.name).toEqual({
                type: {kind: 'scalar', name: 'String'},
                nullable: false,
                column: 'name',
                maxLength: 40
            })
            expect(model.Product.properties.orders).toEqual({
                type: {kind: 'list-relation', entity: 'Order', field: 'productId', cascade: true},
                nullable: false
            })
        })

        it('are sorted so that referenced ones come first', function() {
            expect(sortByReferences(model)).toEqual(['Product', 'Order'])
        })
    })

    it('adds a primary key and derives the table name when they are not declared', function() {
        let model = parseModel(`
            type StockItem @entity {
                label: String
            }
        `)
        expect(model.StockItem.table).toEqual('stock_item')
        expect(model.StockItem.properties.id).toEqual({
            type: {kind: 'scalar', name: 'ID'},
            nullable: false,
            column: 'id'
        })
        expect(model.StockItem.properties.label.nullable).toBe(true)
    })

    it('accepts custom scalars', function() {
        let model = parseModel(`
            type Delivery @entity {
                at: DateTime
                weight: BigInt
            }
        `)
        expect(model.Delivery.properties.at.type).toEqual({kind: 'scalar', name: 'DateTime'})
        expect(model.Delivery.properties.weight.type).toEqual({kind: 'scalar', name: 'BigInt'})
    })

    it('loads the schema file', function() {
        let model = loadModel(path.resolve(__dirname, '../../schema.graphql'))
        expect(model.Order.properties.productId.type).toEqual({kind: 'fk', table: 'products'})
        expect(model.Product.table).toEqual('products')
    })

    describe('rejects', function() {
        it('primary key of a wrong type', function() {
            expect(() => parseModel(`
                type Order @entity {
                    id: String!
                }
            `)).toThrow('Order has a property id of unsupported type')
        })

        it('direct references to entities', function() {
            expect(() => parseModel(`
                type Shelf @entity {
                    code: String
                }
                type Box @entity {
                    shelf: Shelf
                }
            `)).toThrow('Box.shelf references entity Shelf directly')
        })

        it('lists without @derivedFrom', function() {
            expect(() => parseModel(`
                type Shelf @entity {
                    boxes: [Box!]!
                }
                type Box @entity {
                    shelfId: Int! @references(table: "shelf")
                }
            `)).toThrow('@derivedFrom directive is required on Shelf.boxes declaration')
        })

        it('@derivedFrom pointing to a non foreign key', function() {
            expect(() => parseModel(`
                type Shelf @entity {
                    boxes: [Box!]! @derivedFrom(field: "label")
                }
                type Box @entity {
                    label: String
                }
            `)).toThrow('Shelf.boxes is derived from Box.label, but it is not a foreign key')
        })

        it('foreign keys which are not integers', function() {
            expect(() => parseModel(`
                type Box @entity {
                    shelfId: String @references(table: "shelf")
                }
            `)).toThrow('Box.shelfId must be of type Int to be a foreign key')
        })

        it('invalid property names', function() {
            expect(() => parseModel(`
                type Box @entity {
                    Label: String
                }
            `)).toThrow('Entity Box has a property with invalid name: Label')
        })
    })
})
