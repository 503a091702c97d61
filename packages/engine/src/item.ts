import { ItemRecord, ItemView } from './types';

/**
 * A collectable thing. Lives in exactly one container: a location's item list
 * or a Pymon's inventory.
 */
export class Item {
    readonly name: string;
    readonly description: string;
    readonly pickable: boolean;
    readonly consumable: boolean;

    constructor(data: ItemRecord) {
        this.name = data.name;
        this.description = data.description;
        this.pickable = data.pickable;
        this.consumable = data.consumable;
    }

    /**
     * Item names match case-insensitively everywhere in the game.
     */
    matches(name: string): boolean {
        return this.name.toLowerCase() === name.trim().toLowerCase();
    }

    /**
     * A distinct instance with the same definition. Only world setup duplicates items.
     */
    clone(): Item {
        return new Item(this.toView());
    }

    toView(): ItemView {
        return {
            name: this.name,
            description: this.description,
            pickable: this.pickable,
            consumable: this.consumable
        };
    }
}

export function findItem(items: readonly Item[], name: string): Item | undefined {
    return items.find(item => item.matches(name));
}

/**
 * Remove a specific instance (not just any item with the same name).
 */
export function removeItem(items: Item[], item: Item): boolean {
    const index = items.indexOf(item);
    if (index === -1) return false;
    items.splice(index, 1);
    return true;
}
