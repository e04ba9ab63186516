import {ViewModelFactory} from "./descriptor"
import {ChangeBus} from "./events"
import type {Model} from "./model"
import {Repository} from "./repository"
import type {Storage} from "./storage"
import {TypeMapper} from "./typeMapper"


export interface App {
    model: Model
    factory: ViewModelFactory
    bus: ChangeBus
    repository: Repository
}


export interface AppOptions {
    model: Model
    storage: Storage
    typeMapper?: TypeMapper
}


/**
 * Wires the parts sharing a single change bus.
 */
export function createApp(options: AppOptions): App {
    let bus = new ChangeBus()
    return {
        model: options.model,
        factory: new ViewModelFactory(options.model, options.typeMapper),
        bus,
        repository: new Repository(options.storage, bus)
    }
}
