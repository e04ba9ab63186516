import type {Repository} from "./repository"
import type {Handle, ViewModel, ViewModelType} from "./viewModel"


/**
 * `removed` items starting at `position` were replaced by `added` new ones
 */
export type ItemsChangedListener = (position: number, removed: number, added: number) => void


/**
 * Ordered list of view models of a single entity,
 * kept in sync with the database through a {@link Repository}.
 *
 * Membership is tracked by view model handle.
 * The collection does not check that two view models refer to different rows.
 */
export class ObservableCollection implements Iterable<ViewModel> {
    private items: ViewModel[] = []
    private handles = new Set<Handle>()
    private listeners: ItemsChangedListener[] = []

    constructor(
        public readonly type: ViewModelType,
        private repository: Repository
    ) {}

    get length(): number {
        return this.items.length
    }

    get(position: number): ViewModel | undefined {
        return this.items[position]
    }

    has(vm: ViewModel): boolean {
        return this.handles.has(vm.handle)
    }

    indexOf(vm: ViewModel): number {
        if (!this.has(vm)) return -1
        return this.items.findIndex(item => item.handle == vm.handle)
    }

    [Symbol.iterator](): Iterator<ViewModel> {
        return this.items[Symbol.iterator]()
    }

    toArray(): ViewModel[] {
        return this.items.slice()
    }

    append(vm: ViewModel): void {
        this.splice(this.items.length, 0, [vm])
    }

    remove(position: number): void {
        this.splice(position, 1, [])
    }

    clear(): void {
        this.splice(0, this.items.length, [])
    }

    /**
     * Removes `removeCount` items at `position` and inserts `added` in their place,
     * listeners are notified once.
     */
    splice(position: number, removeCount: number, added: readonly ViewModel[]): void {
        if (position < 0 || position > this.items.length) {
            throw new RangeError(`Position ${position} is out of range 0..${this.items.length}`)
        }
        let removing = new Set<Handle>()
        for (let vm of this.items.slice(position, position + removeCount)) {
            removing.add(vm.handle)
        }
        let adding = new Set<Handle>()
        for (let vm of added) {
            this.checkType(vm)
            if (adding.has(vm.handle) || (this.handles.has(vm.handle) && !removing.has(vm.handle))) {
                throw new Error(`${vm} is already listed`)
            }
            adding.add(vm.handle)
        }

        let removed = this.items.splice(position, removeCount, ...added)
        for (let vm of removed) {
            this.handles.delete(vm.handle)
        }
        for (let vm of added) {
            this.handles.add(vm.handle)
        }
        if (removed.length > 0 || added.length > 0) {
            this.emit(position, removed.length, added.length)
        }
    }

    /**
     * Tells listeners that every item has to be re-rendered
     */
    refresh(): void {
        this.emit(0, this.items.length, this.items.length)
    }

    /**
     * @returns unsubscribe function
     */
    onItemsChanged(listener: ItemsChangedListener): () => void {
        this.listeners.push(listener)
        return () => {
            let idx = this.listeners.indexOf(listener)
            if (idx >= 0) {
                this.listeners.splice(idx, 1)
            }
        }
    }

    /**
     * Replaces the contents with every stored row
     */
    async loadAll(): Promise<void> {
        let items = await this.repository.fetchAll(this.type)
        this.splice(0, this.items.length, items)
    }

    /**
     * Saves the items and appends those not listed yet
     */
    async saveItems(items: readonly ViewModel[]): Promise<void> {
        items.forEach(vm => this.checkType(vm))
        await this.repository.save(items)
        for (let vm of items) {
            if (!this.has(vm)) {
                this.append(vm)
            }
        }
    }

    /**
     * Deletes the items and removes them from the list,
     * including those that were never stored.
     */
    async deleteItems(items: readonly ViewModel[]): Promise<void> {
        await this.repository.delete(items)
        for (let vm of items) {
            let idx = this.indexOf(vm)
            if (idx >= 0) {
                this.remove(idx)
            }
        }
    }

    private checkType(vm: ViewModel): void {
        if (!this.type.isTypeOf(vm)) {
            throw new TypeError(`Expected ${this.type.entity} view model, got ${vm.entity}`)
        }
    }

    private emit(position: number, removed: number, added: number): void {
        for (let listener of this.listeners.slice()) {
            listener(position, removed, added)
        }
    }
}
