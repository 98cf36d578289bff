import type { CaptureOptions } from '../config/config-core.ts';
import type { Scheduler } from '../core/scheduler.ts';
import { LocalPtyTransport } from '../pty/local-transport.ts';
import type { PtySpawner } from '../pty/pty-host.ts';
import type { TmuxDriver } from '../pty/tmux-driver.ts';
import { RemoteTransport } from '../remote/remote-transport.ts';
import type { RemoteStreamTimings } from '../remote/stream-client.ts';
import type { DuplexConnector } from '../remote/tcp-duplex.ts';
import type { TransportFactory } from './transport.ts';

export interface TransportFactoryDependencies {
  readonly driver: TmuxDriver;
  readonly capture: CaptureOptions;
  readonly remote: RemoteStreamTimings;
  readonly spawner?: PtySpawner;
  readonly connector?: DuplexConnector;
  readonly scheduler?: Scheduler;
}

export function createTransportFactory(dependencies: TransportFactoryDependencies): TransportFactory {
  return async (request) => {
    if (request.target.kind === 'local') {
      return await LocalPtyTransport.open({
        sessionName: request.sessionName,
        cols: request.cols,
        rows: request.rows,
        driver: dependencies.driver,
        capture: dependencies.capture,
        ...(dependencies.spawner === undefined ? {} : { spawner: dependencies.spawner })
      });
    }
    return await RemoteTransport.open({
      sessionName: request.sessionName,
      endpoint: request.target.endpoint,
      timings: dependencies.remote,
      cols: request.cols,
      rows: request.rows,
      ...(dependencies.connector === undefined ? {} : { connector: dependencies.connector }),
      ...(dependencies.scheduler === undefined ? {} : { scheduler: dependencies.scheduler })
    });
  };
}
