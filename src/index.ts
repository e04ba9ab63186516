export * from "./app"
export * from "./choices"
export * from "./collection"
export * from "./descriptor"
export * from "./editor"
export * from "./events"
export * from "./model"
export {findEntityByTable, getEntity, sortByReferences, validateModel} from "./model.tools"
export * from "./repository"
export * from "./storage"
export * from "./summary"
export {loadModel, parseModel} from "./tools"
export * from "./transaction"
export * from "./typeMapper"
export * from "./viewModel"
