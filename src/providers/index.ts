/**
 * Weather Providers
 */

import type { NormalizedDeviceConfig } from '../config/config-manager';
import { FakeWeatherProvider } from './fake-provider';
import { FileWeatherProvider } from './file-provider';
import { ProviderRegistry } from './provider-registry';
import { WeatherProviderError } from './weather-provider';

export * from './weather-provider';
export * from './provider-registry';
export { FakeWeatherProvider } from './fake-provider';
export { FileWeatherProvider } from './file-provider';

/**
 * Registry with every bundled provider
 */
export function createDefaultRegistry(): ProviderRegistry {
    const registry = new ProviderRegistry();
    registry.registerBatch([
        {
            metadata: { id: 'fake', name: 'Fake', description: 'Synthetic hourly weather for testing' },
            factory: () => new FakeWeatherProvider(),
        },
        {
            metadata: { id: 'file', name: 'File', description: 'Weather read from a local JSON file' },
            factory: (device: NormalizedDeviceConfig) => {
                if (!device.forecastFile) {
                    throw new WeatherProviderError('invalid_config', `Device ${device.name}: forecastFile is required for the file provider`);
                }
                return new FileWeatherProvider(device.forecastFile);
            },
        },
    ]);
    return registry;
}
