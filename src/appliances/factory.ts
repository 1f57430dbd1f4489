import createLogger from '../logger.js'
import type { ApplianceConfig } from '../types/normalized.js'
import type { BaseAppliance } from './base.js'
import { DryerAppliance } from './dryer.js'
import { WasherAppliance } from './washer.js'

const logger = createLogger('factory')

/**
 * Factory for creating appliance instances from configuration
 * Appliances without a device id are disabled and produce no instance
 */
export class ApplianceFactory {
  public static create(config: ApplianceConfig): BaseAppliance | undefined {
    if (!config.deviceId) {
      return undefined
    }

    switch (config.kind) {
      case 'washer':
        return new WasherAppliance(config.deviceId)
      case 'dryer':
        return new DryerAppliance(config.deviceId)
    }
  }

  /**
   * Create every enabled appliance, in configuration order
   */
  public static createEnabled(configs: ApplianceConfig[]): BaseAppliance[] {
    const appliances: BaseAppliance[] = []
    for (const config of configs) {
      const appliance = ApplianceFactory.create(config)
      if (appliance) {
        logger.debug(`Enabled ${appliance.getLabel()} with device id ${appliance.getDeviceId()}`)
        appliances.push(appliance)
      } else {
        logger.info(`${config.kind} device id not set (empty/None) -> ${config.kind} integration disabled.`)
      }
    }
    return appliances
  }
}
