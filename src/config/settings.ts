/**
 * Settings and Configuration Manager
 * Runner settings for the network ACL CLI, merged from options, environment and defaults
 */

import { z } from "zod";
import { ErrorLevel } from "../logging/error-handler";

export interface RunnerSettings {
  environment: 'development' | 'staging' | 'production';
  projectName: string;
  stack: string;
  configPath?: string;
  logLevel: ErrorLevel;
  passphrase: string;
}

const EnvironmentSchema = z.enum(['development', 'staging', 'production']);
const LogLevelSchema = z.nativeEnum(ErrorLevel);

export class SettingsManager {
  private config: RunnerSettings;

  constructor(initialConfig: Partial<RunnerSettings>, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.mergeWithDefaults(initialConfig);
  }

  private mergeWithDefaults(config: Partial<RunnerSettings>): RunnerSettings {
    const environment = EnvironmentSchema.safeParse(this.env.NACL_ENV);
    const logLevel = LogLevelSchema.safeParse(this.env.NACL_LOG_LEVEL?.toUpperCase());
    return {
      environment: config.environment || (environment.success ? environment.data : 'development'),
      projectName: config.projectName || 'network-acl',
      stack: config.stack || this.env.NACL_STACK || 'dev',
      configPath: config.configPath || this.env.NACL_CONFIG,
      logLevel: config.logLevel || (logLevel.success ? logLevel.data : ErrorLevel.INFO),
      passphrase: config.passphrase || this.env.PULUMI_CONFIG_PASSPHRASE || 'nacl-dev'
    };
  }

  getConfig(): RunnerSettings {
    return this.config;
  }

  updateConfig(updates: Partial<RunnerSettings>): void {
    this.config = { ...this.config, ...updates };
  }
}
