import type {Model, Name} from "./model"
import {PRIMARY_KEY} from "./model"
import {findEntityByTable, getEntity} from "./model.tools"
import {TypeMapper, ValueType} from "./typeMapper"
import {toColumn} from "./util"
import {ViewModelType} from "./viewModel"


export interface FieldDescriptor {
    readonly name: Name
    readonly column: string
    readonly valueType: ValueType
    readonly nullable: boolean
    /**
     * Entity referenced by a foreign key field, when it could be resolved
     */
    readonly foreignEntity?: Name
}


export interface EntityDescriptor {
    readonly entity: Name
    readonly table: string
    readonly primaryKey: Name
    readonly fields: readonly FieldDescriptor[]
    /**
     * field name -> referenced entity
     */
    readonly foreignKeys: ReadonlyMap<Name, Name>
}


export function getField(descriptor: EntityDescriptor, name: Name): FieldDescriptor | undefined {
    return descriptor.fields.find(f => f.name == name)
}


export class ViewModelFactory {
    private descriptors = new Map<Name, EntityDescriptor>()
    private types = new Map<Name, ViewModelType>()

    constructor(
        public readonly model: Model,
        private typeMapper: TypeMapper = new TypeMapper()
    ) {}

    derive(entityName: Name): EntityDescriptor {
        let descriptor = this.descriptors.get(entityName)
        if (descriptor == null) {
            descriptor = this.buildDescriptor(entityName)
            this.descriptors.set(entityName, descriptor)
        }
        return descriptor
    }

    viewModelType(entityName: Name): ViewModelType {
        let type = this.types.get(entityName)
        if (type == null) {
            type = new ViewModelType(this.derive(entityName))
            this.types.set(entityName, type)
        }
        return type
    }

    entities(): Name[] {
        return Object.keys(this.model)
    }

    private buildDescriptor(entityName: Name): EntityDescriptor {
        let entity = getEntity(this.model, entityName)
        let fields: FieldDescriptor[] = []
        let foreignKeys = new Map<Name, Name>()

        for (let key in entity.properties) {
            let prop = entity.properties[key]
            let valueType = this.typeMapper.map(prop.type)
            if (valueType == null) continue

            let foreignEntity: Name | undefined
            if (prop.type.kind == 'fk') {
                foreignEntity = findEntityByTable(this.model, prop.type.table)
                if (foreignEntity) {
                    foreignKeys.set(key, foreignEntity)
                }
            }

            fields.push(Object.freeze({
                name: key,
                column: prop.column ?? toColumn(key),
                valueType,
                nullable: key == PRIMARY_KEY ? false : prop.nullable,
                foreignEntity
            }))
        }

        return Object.freeze({
            entity: entityName,
            table: entity.table,
            primaryKey: PRIMARY_KEY,
            fields: Object.freeze(fields),
            foreignKeys
        })
    }
}
