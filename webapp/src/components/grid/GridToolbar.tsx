import React from 'react';
import { FontAwesomeIcon } from '@fortawesome/react-fontawesome';
import {
    faArrowsRotate,
    faFloppyDisk,
    faFolderOpen,
    faImage,
    faLayerGroup,
    faPause,
    faPlay,
} from '@fortawesome/free-solid-svg-icons';
import './GridToolbar.css';

interface GridToolbarProps {
    autoRepaint: boolean;
    layerCount: number;
    onSave: () => void;
    onLoad: () => void;
    onExport: () => void;
    onToggleAutoRepaint: () => void;
    onRepaint: () => void;
    onAddLayer: () => void;
}

const GridToolbar: React.FC<GridToolbarProps> = ({
    autoRepaint,
    layerCount,
    onSave,
    onLoad,
    onExport,
    onToggleAutoRepaint,
    onRepaint,
    onAddLayer,
}) => (
    <div className="grid-toolbar" role="toolbar" aria-label="Grid actions">
        <button type="button" onClick={onSave} title="Save snapshot">
            <FontAwesomeIcon icon={faFloppyDisk} /> Save
        </button>
        <button type="button" onClick={onLoad} title="Load snapshot">
            <FontAwesomeIcon icon={faFolderOpen} /> Load
        </button>
        <button type="button" onClick={onExport} title="Export PNG">
            <FontAwesomeIcon icon={faImage} /> Export
        </button>
        <button type="button" onClick={onToggleAutoRepaint} title="Toggle auto repaint" aria-pressed={autoRepaint}>
            <FontAwesomeIcon icon={autoRepaint ? faPause : faPlay} /> Auto repaint: {autoRepaint ? 'on' : 'off'}
        </button>
        <button type="button" onClick={onRepaint} disabled={autoRepaint} title="Repaint now">
            <FontAwesomeIcon icon={faArrowsRotate} /> Repaint
        </button>
        <button type="button" onClick={onAddLayer} title="Add layer">
            <FontAwesomeIcon icon={faLayerGroup} /> Layers: {layerCount}
        </button>
    </div>
);

export default GridToolbar;
