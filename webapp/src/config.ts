// webapp/src/config.ts
import type { GridOptions } from './grid/types';

export interface GridConfig extends Required<Pick<GridOptions, 'width' | 'height' | 'cellSize' | 'gridlineWeight' | 'autoRepaint'>> {
    title: string;
}

export const DEFAULT_CONFIG: Readonly<GridConfig> = {
    width: 10,
    height: 10,
    cellSize: 50,
    gridlineWeight: 5,
    title: 'Simple Grid',
    autoRepaint: true,
};

type EnvSource = Record<string, string | boolean | undefined>;

function readInteger(env: EnvSource, key: string, fallback: number, min: number): number {
    const raw = env[key];
    if (raw === undefined || raw === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        console.warn(`Config: Ignoring ${key}="${String(raw)}" (expected an integer >= ${min}). Using ${fallback}.`);
        return fallback;
    }
    return value;
}

function readBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
    const raw = env[key];
    if (raw === undefined || raw === '') {
        return fallback;
    }
    if (raw === true || raw === 'true' || raw === '1') return true;
    if (raw === false || raw === 'false' || raw === '0') return false;
    console.warn(`Config: Ignoring ${key}="${String(raw)}" (expected true/false). Using ${fallback}.`);
    return fallback;
}

/**
 * Reads the grid setup from Vite env vars (`VITE_GRID_WIDTH`, `VITE_GRID_HEIGHT`,
 * `VITE_CELL_SIZE`, `VITE_GRIDLINE_WEIGHT`, `VITE_GRID_TITLE`, `VITE_AUTO_REPAINT`).
 */
export function loadGridConfig(env: EnvSource = import.meta.env): GridConfig {
    const title = env.VITE_GRID_TITLE;
    return {
        width: readInteger(env, 'VITE_GRID_WIDTH', DEFAULT_CONFIG.width, 1),
        height: readInteger(env, 'VITE_GRID_HEIGHT', DEFAULT_CONFIG.height, 1),
        cellSize: readInteger(env, 'VITE_CELL_SIZE', DEFAULT_CONFIG.cellSize, 1),
        gridlineWeight: readInteger(env, 'VITE_GRIDLINE_WEIGHT', DEFAULT_CONFIG.gridlineWeight, 0),
        title: typeof title === 'string' && title !== '' ? title : DEFAULT_CONFIG.title,
        autoRepaint: readBoolean(env, 'VITE_AUTO_REPAINT', DEFAULT_CONFIG.autoRepaint),
    };
}
