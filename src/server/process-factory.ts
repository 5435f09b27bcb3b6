import { expandGameArgs, HostConfig } from '../config';
import type { Session } from '../lifecycle/types';
import { LocalProcessHandle } from '../process/local-process';
import type { ProcessHandleFactory } from '../process/types';

/**
 * Launches the configured game binary in the session's folder, with turn
 * hooks that call back into this server.
 */
export function createLocalProcessFactory(config: HostConfig): ProcessHandleFactory {
  return (session: Session) => {
    const query = `session=${encodeURIComponent(session.id)}`;
    return new LocalProcessHandle({
      binary: config.gameBinary,
      args: [
        ...expandGameArgs(config.gameArgs, session),
        '--preexec', `curl -s -X POST ${config.hookBaseUrl}/hooks/pre-advance?${query}`,
        '--postexec', `curl -s -X POST ${config.hookBaseUrl}/hooks/post-advance?${query}`,
      ],
      workingDir: session.workingDir,
      pid: session.processPid,
    });
  };
}
