// webapp/src/services/snapshotStorage.ts
const STORAGE_KEY_PREFIX = 'layergrid:snapshot:';

function keyFor(name: string): string {
    return `${STORAGE_KEY_PREFIX}${name}`;
}

/**
 * Stores saved grid text under a name. Returns false when the browser refuses
 * the write (quota exceeded, storage disabled).
 */
export function saveSnapshot(name: string, gridData: string, storage: Storage = window.localStorage): boolean {
    try {
        storage.setItem(keyFor(name), gridData);
        console.log(`SnapshotStorage: Saved "${name}" (${gridData.length} chars).`);
        return true;
    } catch (error) {
        console.error(`SnapshotStorage: Failed to save "${name}":`, error);
        return false;
    }
}

/** Saved grid text for a name, or null when nothing was saved under it. */
export function loadSnapshot(name: string, storage: Storage = window.localStorage): string | null {
    try {
        return storage.getItem(keyFor(name));
    } catch (error) {
        console.error(`SnapshotStorage: Failed to read "${name}":`, error);
        return null;
    }
}
