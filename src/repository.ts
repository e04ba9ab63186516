import type {ChangeBus, ChangeListener} from "./events"
import type {Name} from "./model"
import type {Storage} from "./storage"
import type {ViewModel, ViewModelType} from "./viewModel"


export class Repository {
    constructor(
        private storage: Storage,
        private bus: ChangeBus
    ) {}

    /**
     * Inserts or updates all view models within one transaction.
     *
     * After commit, keys assigned by the database are written back onto the view models
     * and a single change of their entity is published.
     * Nothing is written back or published when the transaction fails.
     */
    async save(viewModels: readonly ViewModel[]): Promise<void> {
        let entity = batchEntity(viewModels)
        if (entity == null) return
        let keys = await this.storage.transact(async tx => {
            let keys: number[] = []
            for (let vm of viewModels) {
                keys.push(await tx.merge(vm.toEntity()))
            }
            return keys
        })
        viewModels.forEach((vm, idx) => vm.assignKey(keys[idx]))
        await this.bus.publish(entity)
    }

    /**
     * Deletes stored rows of the view models within one transaction.
     *
     * Pending view models are skipped, rows which are already gone are not an error.
     * The change is published even when nothing was stored.
     */
    async delete(viewModels: readonly ViewModel[]): Promise<void> {
        let entity = batchEntity(viewModels)
        if (entity == null) return
        let stored = viewModels.filter(vm => !vm.isPending())
        if (stored.length > 0) {
            await this.storage.transact(async tx => {
                for (let vm of stored) {
                    let key = vm.key
                    if (key.kind == 'pending') continue
                    let row = await tx.get(vm.entity, key.value)
                    if (row) {
                        await tx.delete(vm.entity, key.value)
                    }
                }
            })
        }
        await this.bus.publish(entity)
    }

    fetchAll(type: ViewModelType): Promise<ViewModel[]> {
        return this.storage.transact(async tx => {
            let rows = await tx.getAll(type.entity)
            return rows.map(row => type.fromEntity(row))
        })
    }

    /**
     * @returns unsubscribe function
     */
    subscribe(listener: ChangeListener): () => void {
        return this.bus.subscribe(listener)
    }
}


function batchEntity(viewModels: readonly ViewModel[]): Name | undefined {
    if (viewModels.length == 0) return undefined
    let entity = viewModels[0].entity
    for (let vm of viewModels) {
        if (vm.entity != entity) {
            throw new Error(
                `Batch must contain view models of a single entity, got both ${entity} and ${vm.entity}`
            )
        }
    }
    return entity
}
