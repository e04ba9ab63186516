import {expect} from "expect"
import {isValueOfType, scalarType, TypeMapper} from "../typeMapper"


describe('type mapper', function() {
    let mapper = new TypeMapper()

    it('maps built-in scalars', function() {
        expect(mapper.map({kind: 'scalar', name: 'ID'})).toEqual('integer')
        expect(mapper.map({kind: 'scalar', name: 'Int'})).toEqual('integer')
        expect(mapper.map({kind: 'scalar', name: 'Float'})).toEqual('float')
        expect(mapper.map({kind: 'scalar', name: 'String'})).toEqual('string')
        expect(mapper.map({kind: 'scalar', name: 'Boolean'})).toEqual('boolean')
    })

    it('maps every foreign key to integer', function() {
        expect(mapper.map({kind: 'fk', table: 'products'})).toEqual('integer')
        expect(mapper.map({kind: 'fk', table: 'unknown'})).toEqual('integer')
    })

    it('leaves other types unmapped', function() {
        expect(mapper.map({kind: 'scalar', name: 'DateTime'})).toBeUndefined()
        expect(mapper.map({kind: 'scalar', name: 'JSON'})).toBeUndefined()
        expect(mapper.map({kind: 'list-relation', entity: 'Order', field: 'productId', cascade: true})).toBeUndefined()
    })

    it('consults extra mappings first', function() {
        let custom = new TypeMapper([
            {match: scalarType('BigInt'), value: 'string'},
            {match: scalarType('Int'), value: 'float'}
        ])
        expect(custom.map({kind: 'scalar', name: 'BigInt'})).toEqual('string')
        expect(custom.map({kind: 'scalar', name: 'Int'})).toEqual('float')
        expect(custom.map({kind: 'scalar', name: 'String'})).toEqual('string')
    })

    it('checks values against value types', function() {
        expect(isValueOfType('integer', 3)).toBe(true)
        expect(isValueOfType('integer', 1.5)).toBe(false)
        expect(isValueOfType('float', 1.5)).toBe(true)
        expect(isValueOfType('string', 1)).toBe(false)
        expect(isValueOfType('boolean', false)).toBe(true)
        expect(isValueOfType('boolean', null)).toBe(false)
    })
})
