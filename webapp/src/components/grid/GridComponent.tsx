import React, {
    useRef,
    useEffect,
    useState,
    useCallback,
    forwardRef,
    useImperativeHandle,
} from 'react';
import { LayeredGrid } from '../../grid/layeredGrid';
import { gridPixelSize, PointerTracker, type PointerNotice } from '../../grid/pointer';
import { fitFontSize, paintCell, paintGrid, renderGridImage } from '../../grid/painter';
import type { RepaintRequest } from '../../grid/types';
import type { GridEventPayload, GridHandle, GridSentMessage } from './types';
import './GridComponent.css';

// --- Component Props ---
interface GridComponentProps {
    id: string; // Instance ID
    title: string;
    grid: LayeredGrid;
    pointer: PointerTracker;
    onInteraction?: (message: GridSentMessage) => void;
}

/**
 * Host window for a {@link LayeredGrid}: a fixed-size canvas that repaints on
 * the grid's requests and forwards mouse activity to the pointer tracker.
 */
const GridComponent = forwardRef<GridHandle, GridComponentProps>(
    ({ id, title, grid, pointer, onInteraction }, ref) => {

        // --- Refs ---
        const canvasRef = useRef<HTMLCanvasElement>(null);
        const contextRef = useRef<CanvasRenderingContext2D | null>(null);
        const fontRef = useRef<string | null>(null); // sized once per context

        // --- State ---
        const [initError, setInitError] = useState<string | null>(null);

        const pixelWidth = gridPixelSize(grid.width, grid.cellSize, grid.gridlineWeight);
        const pixelHeight = gridPixelSize(grid.height, grid.cellSize, grid.gridlineWeight);

        const reportError = useCallback((message: string) => {
            console.error(`GridComponent ${id}: ${message}`);
            onInteraction?.({ id: 0, component: 'grid', type: 'error', src: id, payload: { message } });
        }, [id, onInteraction]);

        // --- Painting ---
        const handleRepaint = useCallback((request: RepaintRequest) => {
            const context = contextRef.current;
            if (!context) {
                return;
            }
            if (fontRef.current === null) {
                fontRef.current = fitFontSize(context, grid.cellSize);
            }
            try {
                if (request.kind === 'cell') {
                    paintCell(context, grid, request.x, request.y, fontRef.current);
                } else {
                    paintGrid(context, grid, fontRef.current);
                }
            } catch (error) {
                reportError(`Repaint failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        }, [grid, reportError]);

        // --- Effect: obtain the 2D context, paint once, follow repaint requests ---
        useEffect(() => {
            setInitError(null);
            const canvas = canvasRef.current;
            if (!canvas) {
                setInitError('Canvas element not found.');
                return;
            }

            const context = canvas.getContext('2d');
            if (!context) {
                console.error(`GridComponent ${id}: Failed to get 2D context (returned null).`);
                setInitError('Failed to get 2D context.');
                return;
            }

            console.log(`GridComponent ${id}: Context obtained (${grid.width}x${grid.height} cells).`);
            contextRef.current = context;
            fontRef.current = null;
            handleRepaint({ kind: 'full' });
            const unsubscribe = grid.subscribe(handleRepaint);

            return () => {
                unsubscribe();
                contextRef.current = null;
            };
        }, [id, grid, handleRepaint]);

        useImperativeHandle(ref, () => ({
            repaint: () => grid.repaint(),
            toImage: () => renderGridImage(grid),
        }), [grid]);

        // --- Mouse input ---
        const sendEvent = useCallback((event: GridEventPayload['event']) => {
            const cell = pointer.getMouseCell();
            onInteraction?.({
                id: 0,
                component: 'grid',
                type: 'event',
                src: id,
                payload: { event, x: cell?.x ?? null, y: cell?.y ?? null },
            });
        }, [id, pointer, onInteraction]);

        const dispatchMove = useCallback((event: React.MouseEvent<HTMLCanvasElement>) => {
            const bounds = event.currentTarget.getBoundingClientRect();
            const notice: PointerNotice = {
                kind: 'move',
                px: event.clientX - bounds.left,
                py: event.clientY - bounds.top,
            };
            pointer.dispatch(notice);
        }, [pointer]);

        const handleMouseDown = useCallback((event: React.MouseEvent<HTMLCanvasElement>) => {
            dispatchMove(event);
            pointer.dispatch({ kind: 'buttonDown' });
            sendEvent('buttonDown');
        }, [pointer, dispatchMove, sendEvent]);

        const handleMouseUp = useCallback((event: React.MouseEvent<HTMLCanvasElement>) => {
            dispatchMove(event);
            pointer.dispatch({ kind: 'buttonUp' });
            sendEvent('buttonUp');
        }, [pointer, dispatchMove, sendEvent]);

        const handleMouseLeave = useCallback(() => {
            pointer.dispatch({ kind: 'leave' });
        }, [pointer]);

        // The button state is tracked across the whole window, so a release
        // outside the canvas still ends a drag.
        useEffect(() => {
            const release = () => pointer.dispatch({ kind: 'buttonUp' });
            window.addEventListener('mouseup', release);
            return () => window.removeEventListener('mouseup', release);
        }, [pointer]);

        return (
            <div className="grid-container">
                <h3 className="grid-title">{title}</h3>
                {initError && <p className="grid-error">Grid unavailable: {initError}</p>}
                <canvas
                    ref={canvasRef}
                    className="grid-canvas"
                    width={pixelWidth}
                    height={pixelHeight}
                    style={{ width: `${pixelWidth}px`, height: `${pixelHeight}px` }}
                    role="grid"
                    aria-label={title}
                    aria-colcount={grid.width}
                    aria-rowcount={grid.height}
                    onMouseMove={dispatchMove}
                    onMouseDown={handleMouseDown}
                    onMouseUp={handleMouseUp}
                    onMouseLeave={handleMouseLeave}
                />
            </div>
        );
    },
);
GridComponent.displayName = 'GridComponent'; // For React DevTools

export default GridComponent;
