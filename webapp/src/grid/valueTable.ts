// webapp/src/grid/valueTable.ts
import type { GridImage, ValueAppearance } from './types';
import { InvalidArgumentError } from './errors';

export const DEFAULT_COLOR = 'white';
export const DEFAULT_TEXT_COLOR = 'black';

const DEFAULT_APPEARANCE: Readonly<ValueAppearance> = Object.freeze({
    color: DEFAULT_COLOR,
    glyph: '',
    textColor: DEFAULT_TEXT_COLOR,
    image: null,
});

function defaultAppearance(): ValueAppearance {
    return { ...DEFAULT_APPEARANCE };
}

/**
 * Maps integer cell values to how they are drawn.
 *
 * Entries are created lazily the first time a value is written or configured,
 * and are never removed. Value 0 is seeded with a null color so that it is
 * transparent on every layer above the base one.
 */
export class ValueTable {
    private readonly entries = new Map<number, ValueAppearance>();

    constructor() {
        this.entries.set(0, { ...defaultAppearance(), color: null });
    }

    get size(): number {
        return this.entries.size;
    }

    has(value: number): boolean {
        return this.entries.has(value);
    }

    /** The stored entry, or the default appearance when none was created yet. */
    get(value: number): Readonly<ValueAppearance> {
        return this.entries.get(value) ?? DEFAULT_APPEARANCE;
    }

    ensure(value: number): ValueAppearance {
        let entry = this.entries.get(value);
        if (!entry) {
            entry = defaultAppearance();
            this.entries.set(value, entry);
        }
        return entry;
    }

    /** A null color is transparent; the empty string is not a color. */
    setColor(value: number, color: string | null): void {
        if (color === '') {
            throw new InvalidArgumentError('Cell color cannot be empty; use null for transparent.');
        }
        this.ensure(value).color = color;
    }

    setTextColor(value: number, textColor: string | null): void {
        if (textColor === null || textColor === '') {
            throw new InvalidArgumentError('Text color cannot be null.');
        }
        this.ensure(value).textColor = textColor;
    }

    setGlyph(value: number, glyph: string | null): void {
        const text = glyph ?? '';
        if (Array.from(text).length > 1) {
            throw new InvalidArgumentError(`Cell text must be a single character, got "${text}".`);
        }
        this.ensure(value).glyph = text;
    }

    setImage(value: number, image: GridImage | null): void {
        this.ensure(value).image = image;
    }
}
