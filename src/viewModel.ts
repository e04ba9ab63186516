import assert from "assert"
import type {EntityDescriptor, FieldDescriptor} from "./descriptor"
import type {Name} from "./model"
import type {EntityRow} from "./storage"
import {defaultValue, isValueOfType, Value} from "./typeMapper"


/**
 * Surrogate identity of a view model, stable for its whole life
 */
export type Handle = number


export type RowKey =
    {kind: 'pending'} |
    {kind: 'assigned', value: number}


export const PENDING: RowKey = {kind: 'pending'}


/**
 * What the primary key property reads as while the row is pending.
 */
export const SENTINEL_KEY = 0


export type PropertyListener = (name: Name, value: Value) => void


let lastHandle = 0


export class ViewModel {
    public readonly handle: Handle = ++lastHandle
    private values = new Map<Name, Value>()
    private rowKey: RowKey = PENDING
    private listeners: PropertyListener[] = []

    constructor(public readonly descriptor: EntityDescriptor, init?: Record<Name, Value>) {
        for (let field of descriptor.fields) {
            if (field.name == descriptor.primaryKey) continue
            this.values.set(field.name, field.nullable ? null : defaultValue(field.valueType))
        }
        if (init) {
            for (let name in init) {
                if (this.findField(name)) {
                    this.set(name, init[name])
                }
            }
        }
    }

    get entity(): Name {
        return this.descriptor.entity
    }

    get key(): RowKey {
        return this.rowKey
    }

    isPending(): boolean {
        return this.rowKey.kind == 'pending'
    }

    /**
     * Records the key the database assigned to this row.
     *
     * Unlike setting the key property, this never makes the row pending,
     * even for a key equal to {@link SENTINEL_KEY}. Such a row reads its key property as `0`,
     * yet `toEntity` keeps the key and `Repository.delete` does not skip it.
     * `serial` keys start at 1, so only rows written outside of this library can have it.
     */
    assignKey(value: number): void {
        if (!Number.isInteger(value)) {
            throw invalidValueError(this.entity, this.descriptor.primaryKey, value)
        }
        this.setKey({kind: 'assigned', value})
    }

    get(name: Name): Value {
        if (name == this.descriptor.primaryKey) {
            return this.rowKey.kind == 'assigned' ? this.rowKey.value : SENTINEL_KEY
        }
        let value = this.values.get(name)
        if (value === undefined) {
            throw unknownPropertyError(this.entity, name)
        }
        return value
    }

    set(name: Name, value: Value): void {
        let field = this.findField(name)
        if (field == null) {
            throw unknownPropertyError(this.entity, name)
        }
        if (name == this.descriptor.primaryKey) {
            if (value == null || value === SENTINEL_KEY) {
                this.setKey(PENDING)
            } else if (typeof value == 'number' && Number.isInteger(value)) {
                this.setKey({kind: 'assigned', value})
            } else {
                throw invalidValueError(this.entity, name, value)
            }
            return
        }
        if (value == null ? !field.nullable : !isValueOfType(field.valueType, value)) {
            throw invalidValueError(this.entity, name, value)
        }
        if (this.values.get(name) === value) return
        this.values.set(name, value)
        this.notify(name, value)
    }

    /**
     * Subscribes to property changes.
     *
     * @returns unsubscribe function
     */
    onChange(listener: PropertyListener): () => void {
        this.listeners.push(listener)
        return () => {
            let idx = this.listeners.indexOf(listener)
            if (idx >= 0) {
                this.listeners.splice(idx, 1)
            }
        }
    }

    /**
     * Converts to a plain row. A pending key becomes `null`,
     * which makes the storage insert the row instead of updating it.
     */
    toEntity(): EntityRow {
        let fields: Record<Name, Value> = {}
        for (let field of this.descriptor.fields) {
            if (field.name == this.descriptor.primaryKey) {
                fields[field.name] = this.rowKey.kind == 'assigned' ? this.rowKey.value : null
            } else {
                fields[field.name] = this.get(field.name)
            }
        }
        return {entity: this.entity, fields}
    }

    toString(): string {
        let key = this.rowKey.kind == 'assigned' ? this.rowKey.value : 'pending'
        return `${this.entity}(${key})`
    }

    private findField(name: Name): FieldDescriptor | undefined {
        return this.descriptor.fields.find(f => f.name == name)
    }

    private setKey(key: RowKey): void {
        let prev = this.rowKey
        this.rowKey = key
        if (!sameKey(prev, key)) {
            this.notify(this.descriptor.primaryKey, this.get(this.descriptor.primaryKey))
        }
    }

    private notify(name: Name, value: Value): void {
        for (let listener of this.listeners.slice()) {
            listener(name, value)
        }
    }
}


export class ViewModelType {
    constructor(public readonly descriptor: EntityDescriptor) {}

    get entity(): Name {
        return this.descriptor.entity
    }

    /**
     * Creates a pending view model. Unknown keys of `init` are ignored.
     */
    create(init?: Record<Name, Value>): ViewModel {
        return new ViewModel(this.descriptor, init)
    }

    fromEntity(row: EntityRow): ViewModel {
        assert(row.entity == this.entity, `expected ${this.entity} row, got ${row.entity}`)
        let vm = new ViewModel(this.descriptor)
        for (let field of this.descriptor.fields) {
            let value = row.fields[field.name]
            if (value === undefined) continue
            if (field.name == this.descriptor.primaryKey) {
                if (value != null) {
                    if (typeof value != 'number') {
                        throw invalidValueError(this.entity, field.name, value)
                    }
                    vm.assignKey(value)
                }
            } else {
                vm.set(field.name, value)
            }
        }
        return vm
    }

    isTypeOf(vm: ViewModel): boolean {
        return vm.descriptor === this.descriptor
    }
}


function sameKey(a: RowKey, b: RowKey): boolean {
    if (a.kind == 'pending') return b.kind == 'pending'
    return b.kind == 'assigned' && a.value == b.value
}


function unknownPropertyError(entity: Name, name: Name): Error {
    return new TypeError(`${entity} has no property ${name}`)
}


function invalidValueError(entity: Name, name: Name, value: unknown): Error {
    return new TypeError(`Invalid value for ${entity}.${name}: ${JSON.stringify(value)}`)
}
