import {ObservableCollection} from "./collection"
import {getField} from "./descriptor"
import type {Name} from "./model"
import type {Repository} from "./repository"
import type {Value, ValueType} from "./typeMapper"
import type {Handle, ViewModel, ViewModelType} from "./viewModel"


/**
 * Edit session over all rows of one entity.
 *
 * Added and edited rows are kept pending until {@link commit}.
 * When an entity referenced by a foreign key changes, the rows are reloaded
 * so that choice lists built from them are fresh. Pending edits do not survive a reload.
 */
export class TableEditor {
    public readonly collection: ObservableCollection
    private pending = new Map<Handle, ViewModel>()
    private unsubscribe: (() => void) | undefined

    constructor(
        public readonly type: ViewModelType,
        private repository: Repository
    ) {
        this.collection = new ObservableCollection(type, repository)
    }

    async open(): Promise<void> {
        await this.collection.loadAll()
        if (this.unsubscribe == null) {
            this.unsubscribe = this.repository.subscribe(entity => this.onChanged(entity))
        }
    }

    close(): void {
        this.unsubscribe?.()
        this.unsubscribe = undefined
    }

    get pendingRows(): ViewModel[] {
        return Array.from(this.pending.values())
    }

    addRow(): ViewModel {
        let vm = this.type.create()
        this.collection.append(vm)
        this.pending.set(vm.handle, vm)
        return vm
    }

    /**
     * Sets a field from the text typed into its cell
     */
    edit(vm: ViewModel, field: Name, text: string): void {
        let descriptor = getField(this.type.descriptor, field)
        if (descriptor == null) {
            throw new TypeError(`${this.type.entity} has no property ${field}`)
        }
        vm.set(field, parseCellText(descriptor.valueType, text))
        this.pending.set(vm.handle, vm)
    }

    /**
     * Sets a foreign key field to the key of a chosen row
     */
    choose(vm: ViewModel, field: Name, key: number): void {
        if (!this.type.descriptor.foreignKeys.has(field)) {
            throw new TypeError(`${this.type.entity}.${field} is not a foreign key`)
        }
        vm.set(field, key)
        this.pending.set(vm.handle, vm)
    }

    async deleteRows(vms: readonly ViewModel[]): Promise<void> {
        if (vms.length == 0) return
        await this.collection.deleteItems(vms)
        for (let vm of vms) {
            this.pending.delete(vm.handle)
        }
    }

    async commit(): Promise<void> {
        if (this.pending.size == 0) return
        await this.collection.saveItems(this.pendingRows)
        this.pending.clear()
    }

    private async onChanged(entity: Name): Promise<void> {
        for (let target of this.type.descriptor.foreignKeys.values()) {
            if (target == entity) {
                this.pending.clear()
                await this.collection.loadAll()
                return
            }
        }
    }
}


export function parseCellText(valueType: ValueType, text: string): Value {
    switch(valueType) {
        case 'integer':
            return /^\d+$/.test(text) ? parseInt(text) : 0
        case 'float': {
            let value = text.trim() ? Number(text) : NaN
            return isFinite(value) ? value : 0
        }
        case 'boolean':
            return text.trim().toLowerCase() == 'true'
        case 'string':
            return text
    }
}
