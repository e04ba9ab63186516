import assert from "assert"
import type {ViewModelFactory} from "./descriptor"
import {getField} from "./descriptor"
import type {Name} from "./model"
import type {Repository} from "./repository"
import type {ViewModel} from "./viewModel"


export interface SummaryLine {
    key: number
    name: string
    left: number
    label: string
}


export interface StockSummaryOptions {
    /**
     * Entity holding the stock, e.g. `Product`
     */
    parent: Name
    /**
     * Entity consuming the stock through a foreign key to `parent`, e.g. `Order`
     */
    dependent: Name
    /**
     * @default 'quantity'
     */
    quantity?: Name
}


export type SummaryListener = (lines: readonly SummaryLine[]) => void


/**
 * What is left of every parent row after subtracting the quantities of its dependents.
 *
 * Once started, it is recomputed after every change published by the repository.
 */
export class StockSummary {
    private parent: Name
    private dependent: Name
    private quantity: Name
    private fkField: Name
    private current: SummaryLine[] = []
    private listeners: SummaryListener[] = []
    private unsubscribe: (() => void) | undefined

    constructor(
        private repository: Repository,
        private factory: ViewModelFactory,
        options: StockSummaryOptions
    ) {
        this.parent = options.parent
        this.dependent = options.dependent
        this.quantity = options.quantity || 'quantity'

        let fkField: Name | undefined
        for (let [field, target] of factory.derive(this.dependent).foreignKeys) {
            if (target == this.parent) {
                fkField = field
                break
            }
        }
        if (fkField == null) {
            throw new Error(`${this.dependent} has no foreign key to ${this.parent}`)
        }
        this.fkField = fkField
        for (let entity of [this.parent, this.dependent]) {
            assert(
                getField(factory.derive(entity), this.quantity)?.valueType == 'integer',
                `${entity}.${this.quantity} must be an integer field`
            )
        }
    }

    get lines(): readonly SummaryLine[] {
        return this.current
    }

    async start(): Promise<void> {
        await this.refresh()
        if (this.unsubscribe == null) {
            this.unsubscribe = this.repository.subscribe(async () => {
                await this.refresh()
            })
        }
    }

    stop(): void {
        this.unsubscribe?.()
        this.unsubscribe = undefined
    }

    /**
     * @returns unsubscribe function
     */
    onUpdate(listener: SummaryListener): () => void {
        this.listeners.push(listener)
        return () => {
            let idx = this.listeners.indexOf(listener)
            if (idx >= 0) {
                this.listeners.splice(idx, 1)
            }
        }
    }

    async refresh(): Promise<readonly SummaryLine[]> {
        let parents = await this.repository.fetchAll(this.factory.viewModelType(this.parent))
        let dependents = await this.repository.fetchAll(this.factory.viewModelType(this.dependent))

        let used = new Map<number, number>()
        for (let vm of dependents) {
            let ref = vm.get(this.fkField)
            if (typeof ref != 'number') continue
            used.set(ref, (used.get(ref) || 0) + this.quantityOf(vm))
        }

        let hasName = getField(this.factory.derive(this.parent), 'name') != null
        let lines: SummaryLine[] = []
        for (let vm of parents) {
            let key = vm.key
            if (key.kind == 'pending') continue
            let name = hasName ? String(vm.get('name')) : String(key.value)
            let left = this.quantityOf(vm) - (used.get(key.value) || 0)
            lines.push({key: key.value, name, left, label: formatLeft(name, left)})
        }

        this.current = lines
        for (let listener of this.listeners.slice()) {
            listener(lines)
        }
        return lines
    }

    private quantityOf(vm: ViewModel): number {
        let value = vm.get(this.quantity)
        return typeof value == 'number' ? value : 0
    }
}


export function formatLeft(name: string, left: number): string {
    if (left < 0) {
        return `Need to supply of ${name}: ${-left}`
    } else {
        return `Left of ${name}: ${left}`
    }
}
