import { z } from 'zod';

const requiredText = (label: string) => z.string().trim().min(1, `${label} cannot be empty`);

const yesNo = (label: string) => z.string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['yes', 'no'], { errorMap: () => ({ message: `${label} must be yes or no` }) }))
    .transform(value => value === 'yes');

/**
 * A door cell: `Cave`, `east = Cave`, `None` or empty.
 */
const doorCell = z.string().transform(value => {
    const target = value.replace(/^\s*(west|north|east|south)\s*=\s*/i, '').trim();
    return target === '' || target.toLowerCase() === 'none' ? null : target;
});

export const locationRowSchema = z.object({
    name: requiredText('Name'),
    description: requiredText('Description'),
    west: doorCell,
    north: doorCell,
    east: doorCell,
    south: doorCell
});

export const creatureRowSchema = z.object({
    nickname: requiredText('Nickname'),
    description: requiredText('Description'),
    adoptable: yesNo('Adoptable')
});

export const itemRowSchema = z.object({
    name: requiredText('Name'),
    description: requiredText('Description'),
    pickable: yesNo('Pickable'),
    consumable: yesNo('Consumable')
});
