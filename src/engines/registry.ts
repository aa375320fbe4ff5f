import { SatEngine, EngineCapabilities } from './interface.js';
import { EngineName } from '../types/options.js';
import { createEngineError } from '../types/errors.js';
import { createDPLLEngine } from './dpll/index.js';
import { createMiniSatEngine } from './sat/index.js';

export interface EngineEntry {
    factory: () => Promise<SatEngine>;
    capabilities: EngineCapabilities;
    instance?: SatEngine;
    actualName: string;
}

export const ENGINE_NAMES: readonly EngineName[] = ['dpll', 'minisat'];

export function isEngineName(name: string): name is EngineName {
    return ENGINE_NAMES.some(n => n === name);
}

/**
 * Lazily constructs and caches engines by name.
 */
export class EngineRegistry {
    private registry: Map<string, EngineEntry> = new Map();

    constructor(verifyModels?: boolean) {
        this.registerEngines(verifyModels);
    }

    private registerEngines(verifyModels?: boolean) {
        // Register native DPLL
        this.registry.set('dpll', {
            factory: async () => createDPLLEngine(verifyModels),
            capabilities: {
                deterministic: true,
                trace: true,
                partialModels: true,
            },
            actualName: 'dpll/native'
        });

        // Register MiniSat
        this.registry.set('minisat', {
            factory: async () => createMiniSatEngine(),
            capabilities: {
                deterministic: true,
                trace: false,
                partialModels: true,
            },
            actualName: 'sat/minisat'
        });
    }

    async getEngine(name: string): Promise<SatEngine> {
        const entry = this.registry.get(name);
        if (!entry) {
            if (name === 'dpll/native') return this.getEngine('dpll');
            if (name === 'sat/minisat') return this.getEngine('minisat');
            throw createEngineError(`Engine ${name} not registered`, {
                available: [...this.registry.keys()],
            });
        }

        if (!entry.instance) {
            entry.instance = await entry.factory();
        }
        return entry.instance;
    }

    getEntries(): [string, EngineEntry][] {
        return Array.from(this.registry.entries());
    }
}
