import { isWikiError } from './errors.js';
import { JsonRpcClient } from '../dokuwiki/jsonRpcClient.js';
import { WikiClient } from '../dokuwiki/wikiClient.js';
import { runGit, type GitRunner } from '../git/gitCommand.js';
import { PathMapper } from '../mapping/pathMapper.js';
import { HelperAbort, ProtocolSession } from '../protocol/session.js';
import { LineReader } from '../protocol/lineReader.js';
import { CookieStore } from '../session/cookieStore.js';
import { GitCredentialHelper } from '../session/credentials.js';
import { SessionManager } from '../session/sessionManager.js';
import { IdentityMap } from '../state/identityMap.js';
import type { HelperConfig } from '../util/config.js';
import { logger } from '../util/logger.js';

export interface HelperIO {
  input: AsyncIterable<unknown>;
  output: NodeJS.WritableStream;
  git?: GitRunner;
}

/**
 * Builds the helper's components from its configuration and runs the
 * protocol loop until git hangs up. Resolves to the process exit code.
 */
export async function runHelper(config: HelperConfig, io: HelperIO): Promise<number> {
  const git = io.git ?? runGit;

  try {
    const cookies = await CookieStore.open(config.cookieFile);
    const rpc = new JsonRpcClient({ wikiUrl: config.remote.wikiUrl, jar: cookies.jar });
    const session = new SessionManager({
      rpc,
      cookies,
      user: config.user,
      password: config.password,
      credentialHelper: new GitCredentialHelper(git, {
        protocol: config.remote.protocol,
        host: config.remote.host,
        username: config.user
      }),
      probeRetry: config.probeRetry
    });
    const wiki = new WikiClient({ rpc, session, host: config.remote.host });

    const protocol = new ProtocolSession({
      input: new LineReader(io.input),
      output: io.output,
      remote: wiki,
      mapper: new PathMapper({ namespace: config.remote.namespace, extension: config.extension }),
      identity: await IdentityMap.load(config.stateDir),
      git,
      settings: {
        stateDir: config.stateDir,
        marksPath: config.marksPath,
        privateRefPrefix: config.privateRefPrefix,
        depth: config.depth,
        concurrency: config.concurrency,
        conflictScope: config.conflictScope,
        verbosity: config.verbosity,
        fixedLogLevel: config.logLevelFixed ? config.logLevel : undefined
      },
      connect: () => wiki.connect()
    });

    await protocol.run();
    return 0;
  } catch (error) {
    if (error instanceof HelperAbort || isWikiError(error)) {
      logger.error(error.message);
      return 1;
    }
    logger.error('Unexpected failure', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    });
    return 1;
  }
}
