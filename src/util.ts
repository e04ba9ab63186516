import assert from "assert"
import {underscore} from "inflected"


export function snakeCase(name: string): string {
    return underscore(name)
}


export function toColumn(propName: string): string {
    return snakeCase(propName)
}


export function toTable(entityName: string): string {
    return snakeCase(entityName)
}


export function unsupportedCase(value: string): Error {
    return new Error(`Unsupported case: ${value}`)
}


export function toInt(val: number | string): number {
    let i = typeof val == 'number' ? val : parseInt(val)
    assert(!isNaN(i) && isFinite(i))
    return i
}


export function weakMemo<T extends object, R>(f: (obj: T) => R): (obj: T) => R {
    let cache = new WeakMap<T, R>()
    return function(obj: T): R {
        let val = cache.get(obj)
        if (val === undefined) {
            val = f(obj)
            cache.set(obj, val)
        }
        return val
    }
}
