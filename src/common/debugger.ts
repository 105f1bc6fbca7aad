export type DebugCategory = 'sync' | 'parser' | 'demuxer' | 'decoder' | 'index';

export type DebugLogger = (category: DebugCategory, ...args: unknown[]) => void;

const exported: {
    isDebug: boolean;
    customLogger: DebugLogger | null;
    /** Empty set means all categories enabled */
    enabledCategories: Set<DebugCategory>;
    debugLog: DebugLogger;
} = {
    isDebug: false,
    customLogger: null,
    enabledCategories: new Set<DebugCategory>([]),
    debugLog: (category: DebugCategory, ...args: unknown[]) => {
        if (!exported.isDebug) return;

        if (exported.enabledCategories.size && !exported.enabledCategories.has(category)) return;

        if (exported.customLogger) {
            exported.customLogger(category, ...args);
        } else {
            console.debug(`Category: ${category}`, ...args);
        }
    }
}

export default exported;
