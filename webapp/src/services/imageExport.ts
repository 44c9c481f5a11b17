// webapp/src/services/imageExport.ts
import { LayeredGrid } from '../grid/layeredGrid';
import { renderGridImage, type CanvasFactory } from '../grid/painter';

export const PNG_MIME_TYPE = 'image/png';

/** PNG data URL of the fully rendered grid. */
export function gridToPngDataUrl(grid: LayeredGrid, createCanvas?: CanvasFactory): string {
    return renderGridImage(grid, createCanvas).toDataURL(PNG_MIME_TYPE);
}

/** Renders the grid to PNG and hands it to the browser as a download. */
export function downloadGridPng(grid: LayeredGrid, fileName: string, createCanvas?: CanvasFactory): void {
    const link = document.createElement('a');
    link.href = gridToPngDataUrl(grid, createCanvas);
    link.download = fileName.endsWith('.png') ? fileName : `${fileName}.png`;
    document.body.appendChild(link);
    link.click();
    link.remove();
    console.log(`ImageExport: Exported grid as "${link.download}".`);
}
