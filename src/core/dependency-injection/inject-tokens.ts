// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  HomeDirectory: Symbol.for('HomeDirectory'),
  DeckhandLogger: Symbol.for('DeckhandLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  Middlewares: Symbol.for('Middlewares'),
  ConfigManager: Symbol.for('ConfigManager'),
  K8Factory: Symbol.for('K8Factory'),
  ManifestLoader: Symbol.for('ManifestLoader'),
  DependencyOrderer: Symbol.for('DependencyOrderer'),
  ApplyDriver: Symbol.for('ApplyDriver'),
  StatusPoller: Symbol.for('StatusPoller'),
  DeployCommandHandlers: Symbol.for('DeployCommandHandlers'),
  DeployCommandTasks: Symbol.for('DeployCommandTasks'),
  DeployCommandConfigs: Symbol.for('DeployCommandConfigs'),
};
