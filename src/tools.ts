import fs from "fs"
import {parse, Source} from "graphql"
import {buildSchema, getModel} from "./gql/schema"
import type {Model} from "./model"


export function loadModel(schemaFile: string): Model {
    let src = new Source(
        fs.readFileSync(schemaFile, 'utf-8'),
        schemaFile
    )
    return parseModel(src)
}


export function parseModel(src: string | Source): Model {
    let doc = parse(src)
    let schema = buildSchema(doc)
    return getModel(schema)
}
