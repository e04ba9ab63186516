import type {EntityDescriptor, ViewModelFactory} from "./descriptor"
import {getField} from "./descriptor"
import type {Name} from "./model"
import type {Repository} from "./repository"
import type {Value} from "./typeMapper"


export interface Choice {
    key: number
    label: string
}


const LABEL_PROPERTY = 'name'


/**
 * Options for a foreign key field: every row of the referenced entity.
 *
 * Rows are labeled by their `name` property, or by key when the entity has none.
 * Fields outside of the foreign key map have no options.
 */
export async function loadChoices(
    repository: Repository,
    factory: ViewModelFactory,
    descriptor: EntityDescriptor,
    field: Name
): Promise<Choice[]> {
    let target = descriptor.foreignKeys.get(field)
    if (target == null) return []
    let type = factory.viewModelType(target)
    let hasLabel = getField(type.descriptor, LABEL_PROPERTY) != null
    let rows = await repository.fetchAll(type)
    let choices: Choice[] = []
    for (let vm of rows) {
        let key = vm.key
        if (key.kind == 'pending') continue
        choices.push({
            key: key.value,
            label: hasLabel ? labelOf(vm.get(LABEL_PROPERTY)) : String(key.value)
        })
    }
    return choices
}


export function selectedIndex(choices: readonly Choice[], key: Value): number {
    return choices.findIndex(c => c.key === key)
}


function labelOf(value: Value): string {
    return value == null ? '' : String(value)
}
