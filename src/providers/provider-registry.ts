/**
 * Weather Provider Registry
 *
 * Implements a plugin/registry pattern for weather providers.
 * Providers register a factory under their id and are created from device configuration.
 */

import type { NormalizedDeviceConfig } from '../config/config-manager';
import { WeatherProviderError, type WeatherProvider } from './weather-provider';

/**
 * Provider metadata for registration
 */
export interface ProviderMetadata {
    id: string;
    name: string;
    description: string;
}

/**
 * Provider factory function
 */
export type ProviderFactory = (device: NormalizedDeviceConfig) => WeatherProvider;

export interface ProviderPlugin {
    metadata: ProviderMetadata;
    factory: ProviderFactory;
}

/**
 * Registry for managing weather provider plugins
 */
export class ProviderRegistry {
    private readonly providers = new Map<string, ProviderPlugin>();

    /**
     * Register a provider plugin
     */
    register(plugin: ProviderPlugin): void {
        if (this.providers.has(plugin.metadata.id)) {
            throw new Error(`Weather provider with id '${plugin.metadata.id}' is already registered`);
        }
        this.providers.set(plugin.metadata.id, plugin);
    }

    /**
     * Register multiple provider plugins
     */
    registerBatch(plugins: ProviderPlugin[]): void {
        for (const plugin of plugins) {
            this.register(plugin);
        }
    }

    get(id: string): ProviderPlugin | undefined {
        return this.providers.get(id);
    }

    getAll(): ProviderPlugin[] {
        return Array.from(this.providers.values());
    }

    getIds(): string[] {
        return Array.from(this.providers.keys());
    }

    has(id: string): boolean {
        return this.providers.has(id);
    }

    /**
     * Create the provider a device is configured with
     */
    create(id: string, device: NormalizedDeviceConfig): WeatherProvider {
        const plugin = this.providers.get(id);
        if (!plugin) {
            throw new WeatherProviderError(
                'invalid_config',
                `Unknown weather provider '${id}'. Available: ${this.getIds().join(', ') || 'none'}`,
            );
        }
        return plugin.factory(device);
    }
}
