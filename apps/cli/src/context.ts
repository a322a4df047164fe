import { join } from "node:path"
import {
  AptPackageManager,
  type CommandRunner,
  GitSourceFetcher,
  loadTemplate,
  type PackageManager,
  Pm2Manager,
  spawnCommand,
  SupervisorManager,
  SystemdServiceManager,
  type Template,
} from "@hostkit/engine"
import type { Logger } from "@hostkit/logger"
import type { HostConfig } from "@hostkit/shared"

/**
 * Everything a plan builder touches on the host. All collaborators share
 * one CommandRunner so tests can swap the whole host out.
 */
export interface HostContext {
  config: HostConfig
  runner: CommandRunner
  logger: Logger
  packages: PackageManager
  systemd: SystemdServiceManager
  supervisor: SupervisorManager
  pm2: Pm2Manager
  git: GitSourceFetcher
  /** Load a template relative to `paths.templatesRoot`, e.g. "nginx/next.conf" */
  template(relativePath: string): Promise<Template>
}

export interface HostContextOptions {
  logger: Logger
  runner?: CommandRunner
}

export function createHostContext(config: HostConfig, options: HostContextOptions): HostContext {
  const runner = options.runner ?? spawnCommand
  return {
    config,
    runner,
    logger: options.logger,
    packages: new AptPackageManager(runner),
    systemd: new SystemdServiceManager(runner),
    supervisor: new SupervisorManager(runner),
    pm2: new Pm2Manager(runner),
    git: new GitSourceFetcher(runner),
    template: relativePath => loadTemplate(join(config.paths.templatesRoot, relativePath)),
  }
}
