import {API, DynamicPlatformPlugin, Logger, PlatformAccessory, PlatformConfig} from 'homebridge';

import {PLATFORM_NAME, PLUGIN_NAME} from './settings';
import {ComfortAccessory} from './accessories/comfort-accessory';
import {ConfigManager, type NormalizedDeviceConfig} from './config/config-manager';
import {
    FORECAST_REFRESH_INTERVAL_MS,
    ONE_SECOND_MS,
    REALTIME_REFRESH_INTERVAL_MS,
} from './constants';
import {ComfortDevice} from './device/comfort-device';
import {createCustomCharacteristics, type CustomCharacteristics} from './hap/custom-characteristics';
import {createDefaultRegistry, type ProviderRegistry, type WeatherProvider} from './providers';
import {FileReadingSource, type ReadingSource} from './sources';
import {ErrorHandler} from './utils/error-handler';
import {LogCategory, StructuredLogger} from './utils/log-context';
import {toError} from './utils/retry';

export type ComfortAccessoryContext = {
    deviceName: string;
};

export interface DeviceEntry {
    device: ComfortDevice;
    accessory: ComfortAccessory;
    provider: WeatherProvider | null;
}

export type WeatherRefresh = 'realtime' | 'forecast' | 'all';

export class ComfortAdvisorPlatform implements DynamicPlatformPlugin {
    public readonly accessories: PlatformAccessory<ComfortAccessoryContext>[] = [];
    public readonly devices = new Map<string, DeviceEntry>();

    public readonly logger: StructuredLogger;
    public readonly errorHandler: ErrorHandler;
    public readonly configManager: ConfigManager;
    public readonly characteristics: CustomCharacteristics;
    public readonly providers: ProviderRegistry;

    /**
     * Settles once devices are created and the first readings are evaluated
     */
    public readonly launching: Promise<void>;

    private readingSource: ReadingSource | undefined;
    private readonly intervals: NodeJS.Timeout[] = [];
    private readonly deviceListeners = new Map<string, () => void>();
    private shuttingDown = false;

    constructor(
        public readonly log: Logger,
        public readonly config: PlatformConfig,
        public readonly api: API,
    ) {
        this.logger = new StructuredLogger(this.log);
        this.errorHandler = new ErrorHandler(this.log, 'Comfort Advisor');
        this.configManager = new ConfigManager(this.config, api.user.storagePath());
        this.characteristics = createCustomCharacteristics(api.hap);
        this.providers = createDefaultRegistry();

        this.logger.debug(`Initializing platform: ${this.configManager.getName()}`, {category: LogCategory.PLATFORM});

        this.launching = new Promise<void>(resolve => {
            this.api.on('didFinishLaunching', () => {
                resolve(this.launch());
            });
        });

        // Shutdown handler: clean up timers, the file watcher and device listeners on platform shutdown
        this.api.on('shutdown', () => {
            this.logger.debug('Shutting down, cleaning up resources...', {category: LogCategory.PLATFORM});
            this.shuttingDown = true;
            for (const interval of this.intervals) {
                clearInterval(interval);
            }
            this.intervals.length = 0;
            this.readingSource?.close();
            for (const removeListener of this.deviceListeners.values()) {
                removeListener();
            }
            this.deviceListeners.clear();
        });
    }

    public configureAccessory(accessory: PlatformAccessory<ComfortAccessoryContext>) {
        this.logger.info(`Loading accessory from cache: ${accessory.displayName}`, {category: LogCategory.PLATFORM});
        this.accessories.push(accessory);
    }

    registerDeviceListener(accessory: PlatformAccessory<ComfortAccessoryContext>, removeListener: () => void) {
        this.deviceListeners.get(accessory.UUID)?.();
        this.deviceListeners.set(accessory.UUID, removeListener);
    }

    /**
     * Re-read the readings file and evaluate the given devices, all devices by default.
     */
    async refreshReadings(entries: DeviceEntry[] = [...this.devices.values()]): Promise<void> {
        if (!this.readingSource || entries.length === 0) {
            return;
        }

        try {
            const readings = await this.readingSource.read();
            this.errorHandler.recover('readReadings');
            for (const entry of entries) {
                entry.device.updateReadings(readings, this.configManager.getTemperatureUnit());
                entry.device.evaluate();
            }
        } catch (error) {
            this.errorHandler.handle(toError(error), {operation: 'readReadings'});
        }
    }

    /**
     * Fetch current conditions and/or the forecast for one device, then evaluate it.
     * A failed fetch keeps the previous weather data.
     */
    async refreshWeather(entry: DeviceEntry, refresh: WeatherRefresh = 'all'): Promise<void> {
        const {device, provider} = entry;
        if (!provider) {
            return;
        }

        const context = {category: LogCategory.WEATHER, deviceName: device.name, provider: provider.type};
        if (refresh !== 'forecast') {
            try {
                const realtime = await provider.realtime();
                device.updateWeather({realtime});
                this.errorHandler.recover('realtime', device.name);
                this.logger.debug(`Current conditions ${realtime.temperature}°C ${realtime.humidity}%`, {...context, operation: 'realtime'});
            } catch (error) {
                this.errorHandler.handle(toError(error), {operation: 'realtime', deviceName: device.name});
            }
        }

        if (refresh !== 'realtime') {
            try {
                const forecast = await provider.forecast();
                device.updateWeather({forecast});
                this.errorHandler.recover('forecast', device.name);
                this.logger.debug(`Forecast with ${forecast.length} samples`, {...context, operation: 'forecast'});
            } catch (error) {
                this.errorHandler.handle(toError(error), {operation: 'forecast', deviceName: device.name});
            }
        }

        device.evaluate();
    }

    private async launch(): Promise<void> {
        try {
            const validation = this.configManager.validate();
            for (const warning of validation.warnings) {
                this.logger.warn(warning, {category: LogCategory.CONFIG});
            }
            for (const error of validation.errors) {
                this.logger.error(error, {category: LogCategory.CONFIG});
            }

            this.createDevices(this.configManager.getDevices());
            this.removeStaleAccessories();

            if (this.devices.size === 0) {
                return;
            }

            const readingsFile = this.configManager.getReadingsFilePath();
            this.logger.info(`Reading sensor states from ${readingsFile}`, {category: LogCategory.READINGS});
            this.readingSource = new FileReadingSource(readingsFile);

            await Promise.all([...this.devices.values()].map(entry => this.refreshWeather(entry)));
            await this.refreshReadings();
            this.startUpdates();
        } catch (error) {
            this.errorHandler.handle(toError(error), {operation: 'launch'});
        }
    }

    private createDevices(devices: NormalizedDeviceConfig[]) {
        for (const config of devices) {
            try {
                const uuid = this.api.hap.uuid.generate(`${PLUGIN_NAME}:${config.name.toLowerCase()}`);
                if (this.devices.has(uuid)) {
                    this.logger.warn(`Skipping duplicate device ${config.name}`, {category: LogCategory.PLATFORM});
                    continue;
                }

                const device = new ComfortDevice(config);
                const provider = config.weatherProvider === 'none' ? null : this.providers.create(config.weatherProvider, config);

                const existingAccessory = this.accessories.find(accessory => accessory.UUID === uuid);
                let accessory: ComfortAccessory;

                if (existingAccessory) {
                    this.logger.info(`Restoring existing accessory from cache: ${existingAccessory.displayName}`, {category: LogCategory.PLATFORM});
                    existingAccessory.context.deviceName = config.name;
                    accessory = new ComfortAccessory(this, existingAccessory, device);
                    this.api.updatePlatformAccessories([existingAccessory]);
                } else {
                    this.logger.info(`Adding new accessory: ${config.name}`, {category: LogCategory.PLATFORM});
                    const platformAccessory = new this.api.platformAccessory<ComfortAccessoryContext>(config.name, uuid);
                    platformAccessory.context.deviceName = config.name;
                    accessory = new ComfortAccessory(this, platformAccessory, device);
                    this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [platformAccessory]);
                    this.accessories.push(platformAccessory);
                }

                if (provider) {
                    this.logger.info(`Weather from ${provider.type}: ${provider.attribution}`, {
                        category: LogCategory.WEATHER,
                        deviceName: config.name,
                    });
                }

                this.devices.set(uuid, {device, accessory, provider});

                // Sensors stay faulted until the first readings arrive
                device.evaluate();
            } catch (error) {
                this.errorHandler.handle(toError(error), {operation: 'createDevice', deviceName: config.name});
            }
        }
    }

    /**
     * Unregister cached accessories for devices that are no longer configured
     */
    private removeStaleAccessories() {
        const stale = this.accessories.filter(accessory => !this.devices.has(accessory.UUID));
        if (stale.length === 0) {
            return;
        }

        for (const accessory of stale) {
            this.logger.info(`Removing accessory no longer configured: ${accessory.displayName}`, {category: LogCategory.PLATFORM});
            this.accessories.splice(this.accessories.indexOf(accessory), 1);
        }
        this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
    }

    private startUpdates() {
        if (this.shuttingDown) {
            return;
        }

        const entries = [...this.devices.values()];
        const pushEntries = entries.filter(entry => !entry.device.config.pollEnabled);

        if (pushEntries.length > 0 && this.readingSource) {
            this.logger.debug('Watching the readings file for changes', {category: LogCategory.READINGS});
            this.readingSource.watch(() => this.runTask('watchReadings', () => this.refreshReadings(pushEntries)));
        }

        for (const entry of entries) {
            const {config} = entry.device;
            if (config.pollEnabled) {
                this.logger.debug(`Polling readings every ${config.pollIntervalMs / ONE_SECOND_MS}s`, {
                    category: LogCategory.READINGS,
                    deviceName: config.name,
                });
                this.intervals.push(setInterval(() => this.runTask('pollReadings', () => this.refreshReadings([entry])), config.pollIntervalMs));
            }

            if (entry.provider) {
                this.intervals.push(
                    setInterval(() => this.runTask('refreshRealtime', () => this.refreshWeather(entry, 'realtime')), REALTIME_REFRESH_INTERVAL_MS),
                    setInterval(() => this.runTask('refreshForecast', () => this.refreshWeather(entry, 'forecast')), FORECAST_REFRESH_INTERVAL_MS),
                );
            }
        }
    }

    private runTask(operation: string, task: () => Promise<void>) {
        task().catch(error => {
            this.errorHandler.handle(toError(error), {operation});
        });
    }
}
