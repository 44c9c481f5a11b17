import {
    useCallback,
    useReducer,
    useState,
    useRef,
    type Reducer,
} from 'react';
import { produce } from 'immer';
import GridComponent from './components/grid/GridComponent';
import GridToolbar from './components/grid/GridToolbar';
import type { GridHandle, GridSentMessage } from './components/grid/types';
import { LayeredGrid } from './grid/layeredGrid';
import { PointerTracker } from './grid/pointer';
import { useFlipOnDrag } from './hooks/useFlipOnDrag';
import { loadGridConfig, type GridConfig } from './config';
import { loadSnapshot, saveSnapshot } from './services/snapshotStorage';
import { downloadGridPng } from './services/imageExport';
import './App.css';

const GRID_ID = 'grid-1';
const SNAPSHOT_NAME = 'latest';

/** Demo setup: white gridlines, value 1 painted blue. */
export function createDemoGrid(config: GridConfig): LayeredGrid {
    const grid = new LayeredGrid(config);
    grid.setGridlineColor('white');
    grid.setColor(1, 'blue');
    return grid;
}

// --- Application State Definition ---
interface AppState {
    autoRepaint: boolean;
    layerCount: number;
    status: string;
    statusKind: 'info' | 'error';
}

type AppAction =
    | { type: 'GRID_MESSAGE'; message: GridSentMessage }
    | { type: 'STATUS'; status: string; statusKind?: AppState['statusKind'] }
    | { type: 'SYNC_GRID'; autoRepaint: boolean; layerCount: number }
    | { type: 'SNAPSHOT_SAVED' };

// =============================================================================
// == Main Application Reducer ==
// =============================================================================
export const appReducer: Reducer<AppState, AppAction> = (state, action): AppState =>
    produce(state, draft => {
        switch (action.type) {
            case 'GRID_MESSAGE': {
                const { message } = action;
                if (message.type === 'error') {
                    draft.status = message.payload.message;
                    draft.statusKind = 'error';
                    return;
                }
                const { event, x, y } = message.payload;
                const where = x === null || y === null ? 'outside the cells' : `over cell (${x}, ${y})`;
                draft.status = `${event} ${where}`;
                draft.statusKind = 'info';
                return;
            }
            case 'STATUS':
                draft.status = action.status;
                draft.statusKind = action.statusKind ?? 'info';
                return;
            case 'SYNC_GRID':
                // Immer hands back the same state when nothing changed
                draft.autoRepaint = action.autoRepaint;
                draft.layerCount = action.layerCount;
                return;
            case 'SNAPSHOT_SAVED':
                draft.status = `Saved snapshot "${SNAPSHOT_NAME}".`;
                draft.statusKind = 'info';
                return;
            default: {
                const exhaustiveCheck: never = action;
                console.warn('Reducer: Received unknown action type:', exhaustiveCheck);
            }
        }
    });

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// == Main Application Component ==
// =============================================================================
function App({ config = loadGridConfig() }: { config?: GridConfig }) {
    const [grid] = useState(() => createDemoGrid(config));
    const [pointer] = useState(() => new PointerTracker(config.width, config.height, config.cellSize, config.gridlineWeight));
    const gridRef = useRef<GridHandle>(null);

    const [appState, dispatch] = useReducer(appReducer, {
        autoRepaint: grid.autoRepaint,
        layerCount: grid.layerCount,
        status: 'Click and drag to flip cells.',
        statusKind: 'info',
    });

    useFlipOnDrag(grid, pointer);

    const syncGrid = useCallback(() => {
        dispatch({ type: 'SYNC_GRID', autoRepaint: grid.autoRepaint, layerCount: grid.layerCount });
    }, [grid]);

    const handleGridInteraction = useCallback((message: GridSentMessage) => {
        dispatch({ type: 'GRID_MESSAGE', message });
    }, []);

    const handleSave = useCallback(() => {
        if (saveSnapshot(SNAPSHOT_NAME, grid.saveGrid())) {
            dispatch({ type: 'SNAPSHOT_SAVED' });
        } else {
            dispatch({ type: 'STATUS', status: 'Could not save the snapshot.', statusKind: 'error' });
        }
    }, [grid]);

    const handleLoad = useCallback(() => {
        const data = loadSnapshot(SNAPSHOT_NAME);
        if (data === null) {
            dispatch({ type: 'STATUS', status: `No snapshot named "${SNAPSHOT_NAME}".`, statusKind: 'error' });
            return;
        }
        try {
            grid.loadGrid(data);
            syncGrid();
            dispatch({ type: 'STATUS', status: `Loaded snapshot "${SNAPSHOT_NAME}".` });
        } catch (error) {
            console.error('App: Failed to load snapshot:', error);
            dispatch({ type: 'STATUS', status: `Load failed: ${describeError(error)}`, statusKind: 'error' });
        }
    }, [grid, syncGrid]);

    const handleExport = useCallback(() => {
        try {
            downloadGridPng(grid, 'grid.png');
            dispatch({ type: 'STATUS', status: 'Exported grid.png.' });
        } catch (error) {
            console.error('App: Failed to export image:', error);
            dispatch({ type: 'STATUS', status: `Export failed: ${describeError(error)}`, statusKind: 'error' });
        }
    }, [grid]);

    const handleToggleAutoRepaint = useCallback(() => {
        grid.setAutoRepaint(!grid.autoRepaint);
        if (grid.autoRepaint) {
            grid.repaint(); // catch up on edits made while paused
        }
        syncGrid();
    }, [grid, syncGrid]);

    const handleRepaint = useCallback(() => {
        gridRef.current?.repaint();
    }, []);

    const handleAddLayer = useCallback(() => {
        grid.addLayer();
        syncGrid();
    }, [grid, syncGrid]);

    return (
        <div className="App">
            <header className="App-header">
                <h1>Layer Grid</h1>
                <p className="App-version">v{__APP_VERSION__}</p>
            </header>
            <main className="App-main">
                <GridToolbar
                    autoRepaint={appState.autoRepaint}
                    layerCount={appState.layerCount}
                    onSave={handleSave}
                    onLoad={handleLoad}
                    onExport={handleExport}
                    onToggleAutoRepaint={handleToggleAutoRepaint}
                    onRepaint={handleRepaint}
                    onAddLayer={handleAddLayer}
                />
                <GridComponent
                    ref={gridRef}
                    id={GRID_ID}
                    title={config.title}
                    grid={grid}
                    pointer={pointer}
                    onInteraction={handleGridInteraction}
                />
                <p className={`App-status status-${appState.statusKind}`} role="status">{appState.status}</p>
            </main>
        </div>
    );
}

export default App;
