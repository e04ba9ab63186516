import type {Name} from "./model"
import type {Value} from "./typeMapper"


/**
 * Plain value of a single entity.
 *
 * `fields` are keyed by property name. The primary key is `null` for rows not stored yet.
 */
export interface EntityRow {
    entity: Name
    fields: Record<Name, Value>
}


export interface Storage {
    /**
     * Runs `block` within a single transaction.
     *
     * The transaction is committed when `block` resolves
     * and rolled back when it rejects, the rejection is passed through.
     */
    transact<T>(block: (tx: StorageTransaction) => Promise<T>): Promise<T>
}


export interface StorageTransaction {
    /**
     * Inserts the row when its primary key is `null`,
     * inserts or updates it by primary key otherwise.
     *
     * @returns primary key of the stored row
     */
    merge(row: EntityRow): Promise<number>

    get(entity: Name, key: number): Promise<EntityRow | undefined>

    /**
     * All rows, ordered by primary key
     */
    getAll(entity: Name): Promise<EntityRow[]>

    /**
     * Deletes a row together with the rows cascading from it.
     *
     * @returns false when there was no such row
     */
    delete(entity: Name, key: number): Promise<boolean>
}
