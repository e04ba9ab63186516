import assert from "assert"
import type {Entity, Model, Name} from "./model"


export function validateModel(model: Model): void {
    validateNames(model)
    validateRelations(model)
}


const TYPE_NAME_REGEX = /^[A-Z][a-zA-Z0-9]*$/
const PROP_NAME_REGEX = /^[a-z][a-zA-Z0-9]*$/


export function validateNames(model: Model): void {
    for (let name in model) {
        if (!TYPE_NAME_REGEX.test(name)) {
            throw new Error(`Invalid entity name: ${name}. It must match ${TYPE_NAME_REGEX}`)
        }
        for (let prop in model[name].properties) {
            if (!PROP_NAME_REGEX.test(prop)) {
                throw new Error(`Entity ${name} has a property with invalid name: ${prop}. It must match ${PROP_NAME_REGEX}.`)
            }
        }
    }
}


export function validateRelations(model: Model): void {
    for (let name in model) {
        let entity = model[name]
        for (let key in entity.properties) {
            let propType = entity.properties[key].type
            if (propType.kind != 'list-relation') continue
            let target = getEntity(model, propType.entity).properties[propType.field]?.type
            if (target?.kind != 'fk') {
                throw new Error(
                    `${name}.${key} is derived from ${propType.entity}.${propType.field}, but it is not a foreign key`
                )
            }
            if (target.table != entity.table) {
                throw new Error(
                    `${name}.${key} is derived from ${propType.entity}.${propType.field}, ` +
                    `but it references table ${target.table} instead of ${entity.table}`
                )
            }
        }
    }
}


export function getEntity(model: Model, name: Name): Entity {
    let entity = model[name]
    assert(entity?.kind == 'entity', `unknown entity: ${name}`)
    return entity
}


/**
 * Linear scan, the first entity owning the table wins.
 */
export function findEntityByTable(model: Model, table: string): Name | undefined {
    for (let name in model) {
        if (model[name].table == table) return name
    }
    return undefined
}


/**
 * Tells whether rows of `dependent.field` get deleted together with the referenced row.
 */
export function isCascading(model: Model, dependent: Name, field: Name): boolean {
    for (let name in model) {
        let properties = model[name].properties
        for (let key in properties) {
            let propType = properties[key].type
            if (propType.kind == 'list-relation'
                && propType.entity == dependent
                && propType.field == field
                && propType.cascade
            ) {
                return true
            }
        }
    }
    return false
}


/**
 * Orders entities so that every entity comes after those it references.
 * Unresolved references and cycles are ignored.
 */
export function sortByReferences(model: Model): Name[] {
    let out: Name[] = []
    let visiting = new Set<Name>()

    function visit(name: Name): void {
        if (out.includes(name) || visiting.has(name)) return
        visiting.add(name)
        let properties = model[name].properties
        for (let key in properties) {
            let propType = properties[key].type
            if (propType.kind != 'fk') continue
            let target = findEntityByTable(model, propType.table)
            if (target) visit(target)
        }
        visiting.delete(name)
        out.push(name)
    }

    for (let name in model) {
        visit(name)
    }
    return out
}
