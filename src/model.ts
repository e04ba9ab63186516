export type Name = string


export type Model = Record<Name, Entity>


export interface Entity {
    kind: 'entity'
    table: string
    properties: Record<Name, Prop>
}


export interface Prop {
    type: PropType
    nullable: boolean
    column?: string
    maxLength?: number
}


export type PropType =
    ScalarPropType |
    FkPropType |
    ListRelPropType


export interface ScalarPropType {
    kind: 'scalar'
    name: Name
}


/**
 * Integer column holding the primary key of a row in `table`.
 *
 * The target is declared by table, not by entity,
 * and gets resolved when view model descriptors are derived.
 */
export interface FkPropType {
    kind: 'fk'
    table: string
}


export interface ListRelPropType {
    kind: 'list-relation'
    entity: Name
    field: Name
    cascade: boolean
}


export const PRIMARY_KEY = 'id'
