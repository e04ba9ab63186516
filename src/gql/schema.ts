import assert from "assert"
import {
    buildASTSchema,
    DocumentNode,
    extendSchema,
    GraphQLField,
    GraphQLList,
    GraphQLNonNull,
    GraphQLObjectType,
    GraphQLOutputType,
    GraphQLScalarType,
    GraphQLSchema,
    parse
} from "graphql"
import type {ConstDirectiveNode} from "graphql/language/ast"
import type {Entity, Model, Prop} from "../model"
import {PRIMARY_KEY} from "../model"
import {validateModel} from "../model.tools"
import {scalars_list} from "../scalars"
import {toColumn, toTable, weakMemo} from "../util"


const baseSchema = buildASTSchema(parse(`
    directive @entity(table: String) on OBJECT
    directive @derivedFrom(field: String!) on FIELD_DEFINITION
    directive @references(table: String!) on FIELD_DEFINITION
    directive @cascade on FIELD_DEFINITION
    directive @length(max: Int!) on FIELD_DEFINITION
    ${scalars_list.map(name => 'scalar ' + name).join('\n')}
`))


export function buildSchema(doc: DocumentNode): GraphQLSchema {
    return extendSchema(baseSchema, doc)
}


export const getModel = weakMemo(buildModel)


export function buildModel(schema: GraphQLSchema): Model {
    let types = schema.getTypeMap()
    let model: Model = {}
    for (let key in types) {
        let type = types[key]
        if (isEntityType(type)) {
            model[type.name] = buildEntity(type)
        }
    }
    validateModel(model)
    return model
}


function isEntityType(type: unknown): type is GraphQLObjectType {
    return type instanceof GraphQLObjectType && !!type.astNode?.directives?.some(d => d.name.value == 'entity')
}


function buildEntity(type: GraphQLObjectType): Entity {
    let properties: Record<string, Prop> = {}
    let fields = type.getFields()

    if (fields[PRIMARY_KEY] == null) {
        properties[PRIMARY_KEY] = {
            type: {kind: 'scalar', name: 'ID'},
            nullable: false,
            column: toColumn(PRIMARY_KEY)
        }
    } else {
        let idType = fields[PRIMARY_KEY].type
        let correctIdType = idType instanceof GraphQLNonNull
            && idType.ofType instanceof GraphQLScalarType
            && idType.ofType.name === 'ID'
        if (!correctIdType) {
            throw unsupportedFieldError(type.name, PRIMARY_KEY)
        }
    }

    for (let key in fields) {
        let f: GraphQLField<unknown, unknown> = fields[key]
        let fieldType: GraphQLOutputType = f.type
        let nullable = true
        if (fieldType instanceof GraphQLNonNull) {
            nullable = false
            fieldType = fieldType.ofType
        }
        if (fieldType instanceof GraphQLScalarType) {
            properties[key] = buildScalarProp(type.name, key, f, fieldType, nullable)
        } else if (fieldType instanceof GraphQLList) {
            let item = fieldType.ofType
            let target = item instanceof GraphQLNonNull ? item.ofType : undefined
            if (nullable || !isEntityType(target)) {
                throw unsupportedFieldError(type.name, key)
            }
            let derivedFrom = getDirective(f, 'derivedFrom')
            if (derivedFrom == null) {
                throw new Error(`@derivedFrom directive is required on ${type.name}.${key} declaration`)
            }
            properties[key] = {
                type: {
                    kind: 'list-relation',
                    entity: target.name,
                    field: getStringArgument(derivedFrom, 'field'),
                    cascade: getDirective(f, 'cascade') != null
                },
                nullable: false
            }
        } else if (isEntityType(fieldType)) {
            throw new Error(
                `${type.name}.${key} references entity ${fieldType.name} directly. ` +
                `Declare an Int field with @references(table: "${getEntityTable(fieldType)}") instead`
            )
        } else {
            throw unsupportedFieldError(type.name, key)
        }
    }

    return {
        kind: 'entity',
        table: getEntityTable(type),
        properties
    }
}


function buildScalarProp(
    typeName: string,
    key: string,
    f: GraphQLField<unknown, unknown>,
    scalar: GraphQLScalarType,
    nullable: boolean
): Prop {
    let column = toColumn(key)
    let references = getDirective(f, 'references')
    if (references) {
        if (scalar.name != 'Int') {
            throw new Error(`${typeName}.${key} must be of type Int to be a foreign key`)
        }
        return {
            type: {kind: 'fk', table: getStringArgument(references, 'table')},
            nullable,
            column
        }
    }
    let prop: Prop = {
        type: {kind: 'scalar', name: scalar.name},
        nullable,
        column
    }
    let length = getDirective(f, 'length')
    if (length) {
        if (scalar.name != 'String') {
            throw new Error(`@length directive is only allowed on String fields, but ${typeName}.${key} is ${scalar.name}`)
        }
        let max = getArgument(length, 'max')
        assert(max.kind == 'IntValue')
        prop.maxLength = parseInt(max.value)
    }
    return prop
}


function getEntityTable(type: GraphQLObjectType): string {
    let entity = type.astNode?.directives?.find(d => d.name.value == 'entity')
    assert(entity != null)
    let table = entity.arguments?.find(arg => arg.name.value == 'table')
    if (table == null) return toTable(type.name)
    assert(table.value.kind == 'StringValue')
    return table.value.value
}


function getDirective(f: GraphQLField<unknown, unknown>, name: string): ConstDirectiveNode | undefined {
    return f.astNode?.directives?.find(d => d.name.value == name)
}


function getArgument(directive: ConstDirectiveNode, name: string) {
    let arg = directive.arguments?.find(a => a.name.value == name)
    assert(arg != null, `argument ${name} is missing on @${directive.name.value}`)
    return arg.value
}


function getStringArgument(directive: ConstDirectiveNode, name: string): string {
    let value = getArgument(directive, name)
    assert(value.kind == 'StringValue')
    return value.value
}


function unsupportedFieldError(type: string, field: string): Error {
    return new Error(`${type} has a property ${field} of unsupported type`)
}
