import type {Name} from "./model"


/**
 * Called with the name of the entity whose stored rows changed.
 */
export type ChangeListener = (entity: Name) => void | Promise<void>


export class ChangeBus {
    private listeners: ChangeListener[] = []

    /**
     * @returns unsubscribe function
     */
    subscribe(listener: ChangeListener): () => void {
        this.listeners.push(listener)
        return () => {
            let idx = this.listeners.indexOf(listener)
            if (idx >= 0) {
                this.listeners.splice(idx, 1)
            }
        }
    }

    /**
     * Calls listeners one by one in subscription order, awaiting each.
     *
     * Listeners subscribed during publishing are not called,
     * a failing listener stops the delivery and the error goes to the publisher.
     */
    async publish(entity: Name): Promise<void> {
        for (let listener of this.listeners.slice()) {
            await listener(entity)
        }
    }

    get size(): number {
        return this.listeners.length
    }
}
