import fs from 'node:fs'
import { Ajv, type ErrorObject } from 'ajv'
import YAML from 'yaml'
import { parseDebugFlags } from './rule-runner.js'
import schema from './schema.json' with { type: 'json' }
import type { RuleOverride, RulesConfig } from './types.js'

export const DEFAULT_CONFIG_FILE = '.moss-rules.yml'

interface RawConfig {
  debug?: string[]
  rules?: Record<string, RuleOverride>
}

export class ConfigLoader {
  private static ajvInstance: Ajv | null = null

  /**
   * Get cached AJV instance (lazy singleton)
   */
  private getAjv(): Ajv {
    if (!ConfigLoader.ajvInstance) {
      ConfigLoader.ajvInstance = new Ajv({
        allErrors: true,
        verbose: true,
      })
    }
    return ConfigLoader.ajvInstance
  }

  /**
   * Load and validate a .moss-rules.yml config
   */
  load(filePath: string): RulesConfig {
    const fileContent = fs.readFileSync(filePath, 'utf-8')
    return this.parse(fileContent)
  }

  /**
   * Validate YAML text; an empty document yields the defaults.
   */
  parse(fileContent: string): RulesConfig {
    const rawConfig: unknown = YAML.parse(fileContent) ?? {}

    const validate = this.getAjv().compile<RawConfig>(schema)
    if (!validate(rawConfig)) {
      const errors = this.formatValidationErrors(validate.errors || [])
      throw new Error(`Config validation failed:\n${errors}`)
    }

    return {
      debug: parseDebugFlags(rawConfig.debug ?? []),
      rules: rawConfig.rules ?? {},
    }
  }

  /**
   * Format AJV validation errors into readable messages
   */
  private formatValidationErrors(errors: ErrorObject[]): string {
    return errors
      .map((err) => {
        const path = err.instancePath || 'root'

        if (err.keyword === 'enum') {
          return `  - ${path}: ${err.message}, allowed values: ${err.params.allowedValues?.join(', ')}`
        }
        if (err.keyword === 'additionalProperties') {
          return `  - ${path}: unknown property '${err.params.additionalProperty}'`
        }

        return `  - ${path}: ${err.message}`
      })
      .join('\n')
  }
}
