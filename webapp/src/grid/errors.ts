// webapp/src/grid/errors.ts

/** Base class for every error thrown by the grid core. */
export class GridError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Bad dimensions, an unknown layer on a read, or a missing required color. */
export class InvalidArgumentError extends GridError {}

/** A cell coordinate outside `[0, width) x [0, height)`. */
export class GridIndexOutOfBoundsError extends GridError {}

/** A required position object was null. */
export class NullInputError extends GridError {}

/** Saved grid text that cannot be written back into the current grid. */
export class GridParseError extends GridError {}
