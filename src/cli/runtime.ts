import { loadCiabConfig, type CiabConfig } from '../config/config-core.ts';
import { resolveCiabRuntimePath, resolveCiabSessionsDirectory } from '../config/ciab-paths.ts';
import { configureEventLog, logInfo, logWarn, shutdownEventLog } from '../diagnostics/event-log.ts';
import { TmuxDriver } from '../pty/tmux-driver.ts';
import { SessionManager } from '../session/session-manager.ts';
import { FileSessionMetadataStore } from '../session/session-persistence.ts';
import { createTransportFactory } from '../session/transport-factory.ts';

export interface CiabRuntime {
  readonly config: CiabConfig;
  readonly configPath: string;
  readonly driver: TmuxDriver;
  readonly manager: SessionManager;
  close(): Promise<void>;
}

interface OpenCiabRuntimeOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly sampleActivity?: boolean;
  readonly tmuxPath?: string;
}

/** Loads config, wires the event log and restores persisted sessions. */
export async function openCiabRuntime(options: OpenCiabRuntimeOptions = {}): Promise<CiabRuntime> {
  const env = options.env ?? process.env;
  const loaded = loadCiabConfig({ env });
  const { config } = loaded;
  configureEventLog({
    enabled: config.debug.log.enabled,
    filePath: resolveCiabRuntimePath(config.debug.log.filePath, env)
  });
  if (loaded.error !== null) {
    logWarn('config.load.failed', { file: loaded.filePath, message: loaded.error });
  }

  const driver = new TmuxDriver(undefined, options.tmuxPath ?? env.CIAB_TMUX_PATH ?? 'tmux');
  const manager = new SessionManager({
    config,
    driver,
    metadataStore: new FileSessionMetadataStore(resolveCiabSessionsDirectory(env)),
    openTransport: createTransportFactory({
      driver,
      capture: config.capture,
      remote: config.remote
    }),
    sampleActivity: options.sampleActivity ?? false
  });
  await manager.startup();
  const restored = await manager.restore();
  logInfo('runtime.ready', { sessions: restored.length });

  return {
    config,
    configPath: loaded.filePath,
    driver,
    manager,
    close: async () => {
      try {
        await manager.shutdown();
      } finally {
        shutdownEventLog();
      }
    }
  };
}
