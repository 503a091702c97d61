import { ENERGY_MAX } from '@pymon-world/engine';
import type { BattleOutcome, ItemView, LocationView, PymonBattleReport, PymonView } from '@pymon-world/engine';

export function formatLocation(location: LocationView): string {
    const lines = [
        `Current Location: ${location.name}`,
        `Description: ${location.description}`
    ];
    const doors = Object.entries(location.doors).map(([direction, name]) => `${direction}: ${name}`);
    lines.push(`Doors: ${doors.length > 0 ? doors.join(', ') : 'none'}`);
    lines.push('Creatures here:');
    for (const creature of location.creatures) {
        lines.push(` * ${creature.nickname}`);
    }
    lines.push('Items available here:');
    for (const item of location.items) {
        lines.push(` * ${item.name}`);
    }
    return lines.join('\n');
}

/**
 * Short listing used by the binocular: names only.
 */
export function formatGlimpse(location: LocationView): string {
    const creatures = location.creatures.map(creature => creature.nickname).join(', ');
    const items = location.items.map(item => item.name).join(', ');
    if (!creatures && !items) {
        return `${location.name}: ${location.description}. No creatures or items in this location.`;
    }
    return `${location.name}: ${location.description}. Creatures: ${creatures || 'none'}; Items: ${items || 'none'}`;
}

export function formatPymon(pymon: PymonView): string {
    return [
        `Pymon Name: ${pymon.nickname}`,
        `Description: ${pymon.description}`,
        `Energy: ${pymon.energy}/${ENERGY_MAX}${pymon.immune ? ' (immune next battle)' : ''}`
    ].join('\n');
}

export function formatInventory(items: readonly ItemView[]): string {
    if (items.length === 0) {
        return 'Your inventory is empty.';
    }
    return ['Inventory items:', ...items.map((item, index) => `${index + 1}. ${item.name} - ${item.description}`)].join('\n');
}

export function formatPets(pets: readonly PymonView[]): string {
    if (pets.length === 0) {
        return "You don't have any other Pymon.";
    }
    return ['Available Pymons:', ...pets.map((pet, index) => `${index + 1}) ${pet.nickname} - ${pet.description}`)].join('\n');
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * dd/mm/yyyy hh:mmAM in local time.
 */
export function formatTimestamp(date: Date): string {
    const hours = date.getHours();
    const twelveHour = hours % 12 === 0 ? 12 : hours % 12;
    const period = hours < 12 ? 'AM' : 'PM';
    return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ${pad(twelveHour)}:${pad(date.getMinutes())}${period}`;
}

export function formatBattleReport(reports: readonly PymonBattleReport[]): string {
    if (reports.length === 0) {
        return 'No battles fought yet.';
    }
    const blocks = reports.map(report => {
        const lines = [`Pymon Nickname: "${report.nickname}"`];
        report.battles.forEach((battle, index) => {
            lines.push(
                `Battle ${index + 1}, ${formatTimestamp(battle.timestamp)} Opponent: "${battle.opponent}", ` +
                `W: ${battle.wins} D: ${battle.draws} L: ${battle.losses}`
            );
        });
        lines.push(`Total: W: ${report.totals.wins} D: ${report.totals.draws} L: ${report.totals.losses}`);
        return lines.join('\n');
    });
    return blocks.join('\n\n');
}

export function formatOutcome(outcome: BattleOutcome): string {
    if (outcome.result === 'won') {
        return `Congrats! You have won the battle and adopted a new Pymon called ${outcome.captured}!`;
    }
    if (outcome.promoted) {
        return `You lost the battle. ${outcome.defeated} ran away; ${outcome.promoted} is now your primary Pymon.`;
    }
    return `You lost the battle. ${outcome.defeated} ran away.`;
}
