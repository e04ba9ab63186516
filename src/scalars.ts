/**
 * Scalars a schema may use besides the built-in GraphQL ones.
 *
 * Every scalar has a column type, but only some of them have
 * a value type on the view model side (see typeMapper.ts).
 * Properties of the others still get a column, they are just left out of view models.
 */


export interface Scalar {
    sqlType: string
}


export const builtinScalars: Record<string, Scalar> = {
    ID: {sqlType: 'integer'},
    Int: {sqlType: 'integer'},
    Float: {sqlType: 'double precision'},
    String: {sqlType: 'text'},
    Boolean: {sqlType: 'boolean'}
}


export const customScalars: Record<string, Scalar> = {
    BigInt: {sqlType: 'numeric'},
    DateTime: {sqlType: 'timestamptz'},
    Bytes: {sqlType: 'bytea'},
    JSON: {sqlType: 'jsonb'}
}


export const scalars_list = Object.keys(customScalars)


export function getSqlType(scalarType: string, maxLength?: number): string {
    if (scalarType == 'String' && maxLength != null) {
        return `varchar(${maxLength})`
    }
    let s = builtinScalars[scalarType] || customScalars[scalarType]
    if (s == null) {
        throw new Error(`Unknown scalar type: ${scalarType}`)
    }
    return s.sqlType
}
