import { Config, loadConfig } from './config.js';
import { EngineRegistry } from './engines/registry.js';

export interface ServerContainer {
    config: Config;
    engines: EngineRegistry;
}

export function createContainer(config: Config = loadConfig()): ServerContainer {
    return {
        config,
        engines: new EngineRegistry(config.verifyModels),
    };
}
