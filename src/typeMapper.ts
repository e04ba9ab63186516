import type {PropType} from "./model"


export type ValueType = 'integer' | 'float' | 'string' | 'boolean'


export type Value = string | number | boolean | null


export interface TypeMapping {
    match: (type: PropType) => boolean
    value: ValueType
}


export function scalarType(name: string): (type: PropType) => boolean {
    return type => type.kind == 'scalar' && type.name == name
}


export const defaultMappings: readonly TypeMapping[] = [
    {match: type => type.kind == 'fk', value: 'integer'},
    {match: scalarType('ID'), value: 'integer'},
    {match: scalarType('Int'), value: 'integer'},
    {match: scalarType('Float'), value: 'float'},
    {match: scalarType('String'), value: 'string'},
    {match: scalarType('Boolean'), value: 'boolean'}
]


export class TypeMapper {
    private mappings: readonly TypeMapping[]

    /**
     * @param extra - consulted before the default mappings
     */
    constructor(extra: readonly TypeMapping[] = []) {
        this.mappings = [...extra, ...defaultMappings]
    }

    /**
     * Value type of the view model property for a schema property type.
     *
     * `undefined` means the property has no representation on the view model.
     */
    map(type: PropType): ValueType | undefined {
        for (let mapping of this.mappings) {
            if (mapping.match(type)) return mapping.value
        }
        return undefined
    }
}


export function isValueOfType(valueType: ValueType, value: Value): boolean {
    switch(valueType) {
        case 'integer':
            return typeof value == 'number' && Number.isInteger(value)
        case 'float':
            return typeof value == 'number'
        case 'string':
            return typeof value == 'string'
        case 'boolean':
            return typeof value == 'boolean'
    }
}


export function defaultValue(valueType: ValueType): Value {
    switch(valueType) {
        case 'integer':
        case 'float':
            return 0
        case 'string':
            return ''
        case 'boolean':
            return false
    }
}
