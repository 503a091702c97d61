import type { Actor } from './actor';
import { Item, findItem, removeItem } from './item';
import { Direction, DIRECTIONS, LocationView, OPPOSITE_DIRECTION, isDirection } from './types';
import { InvalidDirectionError } from './errors';

/**
 * A node of the world graph with up to four doors.
 */
export class Location {
    readonly name: string;
    readonly description: string;
    readonly doors: Record<Direction, Location | null>;
    readonly creatures: Actor[] = [];
    readonly items: Item[] = [];

    constructor(name: string, description: string = '', doors: Partial<Record<Direction, Location | null>> = {}) {
        this.name = name;
        this.description = description;
        this.doors = {
            west: doors.west ?? null,
            north: doors.north ?? null,
            east: doors.east ?? null,
            south: doors.south ?? null
        };
    }

    /**
     * Link this location to `other` in `direction` and `other` back in the opposite one.
     */
    connect(direction: string, other: Location): void {
        if (!isDirection(direction)) {
            throw new InvalidDirectionError(direction);
        }
        this.doors[direction] = other;
        other.doors[OPPOSITE_DIRECTION[direction]] = this;
    }

    /**
     * One-way door: only this side is set.
     */
    setDoor(direction: Direction, other: Location | null): void {
        this.doors[direction] = other;
    }

    getDoor(direction: Direction): Location | null {
        return this.doors[direction];
    }

    /**
     * Neighbours behind non-empty doors, in west/north/east/south order.
     */
    neighbours(): Location[] {
        const result: Location[] = [];
        for (const direction of DIRECTIONS) {
            const door = this.doors[direction];
            if (door) result.push(door);
        }
        return result;
    }

    addCreature(creature: Actor): void {
        this.creatures.push(creature);
    }

    removeCreature(creature: Actor): boolean {
        const index = this.creatures.indexOf(creature);
        if (index === -1) return false;
        this.creatures.splice(index, 1);
        return true;
    }

    findCreature(nickname: string): Actor | undefined {
        return this.creatures.find(creature => creature.nickname === nickname);
    }

    addItem(item: Item): void {
        this.items.push(item);
    }

    findItem(name: string): Item | undefined {
        return findItem(this.items, name);
    }

    removeItem(item: Item): boolean {
        return removeItem(this.items, item);
    }

    /**
     * @param viewer creature left out of the creature list, usually the active Pymon
     */
    toView(viewer?: Actor): LocationView {
        const doors: Partial<Record<Direction, string>> = {};
        for (const direction of DIRECTIONS) {
            const door = this.doors[direction];
            if (door) doors[direction] = door.name;
        }
        return {
            name: this.name,
            description: this.description,
            doors,
            creatures: this.creatures.filter(creature => creature !== viewer).map(creature => creature.toView()),
            items: this.items.map(item => item.toView())
        };
    }
}
