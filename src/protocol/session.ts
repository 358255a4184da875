import { mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { describeError, type WikiError } from '../core/errors.js';
import { ok } from '../core/result.js';
import type { WikiRemote, WikiResult } from '../dokuwiki/types.js';
import { HistoryExporter } from '../export/historyExporter.js';
import { FastImportWriter } from '../export/fastImportWriter.js';
import { resolveRef, type GitRunner } from '../git/gitCommand.js';
import { MarksFile } from '../git/marks.js';
import { FastExportParser } from '../import/fastExportParser.js';
import { PUSHABLE_REF, PushImporter, type ConflictScope } from '../import/pushImporter.js';
import type { PathMapper } from '../mapping/pathMapper.js';
import type { IdentityMap, SquashedBase, SyncHead } from '../state/identityMap.js';
import { createProgressReporter } from '../cli/progress.js';
import { levelForVerbosity, logger, type LogLevel } from '../util/logger.js';
import { parseCommand, quoteStatusMessage } from './commands.js';
import type { LineReader } from './lineReader.js';

export type SessionPhase = 'idle' | 'capabilities-declared' | 'listing' | 'importing' | 'exporting';

export interface ProtocolSettings {
  stateDir: string;
  marksPath: string;
  privateRefPrefix: string;
  depth?: number;
  concurrency: number;
  conflictScope: ConflictScope;
  verbosity: number;
  /** Level fixed by LOG_LEVEL; verbosity options then leave the logger alone. */
  fixedLogLevel?: LogLevel;
}

export interface ProtocolSessionOptions {
  input: LineReader;
  output: NodeJS.WritableStream;
  remote: WikiRemote;
  mapper: PathMapper;
  identity: IdentityMap;
  git: GitRunner;
  settings: ProtocolSettings;
  /** Logs in and checks the wiki's API; called once, before the first remote call. */
  connect?: () => Promise<WikiResult<unknown>>;
}

/**
 * Thrown when the helper cannot go on; the CLI reports it and exits 1.
 */
export class HelperAbort extends Error {
  constructor(message: string, readonly wikiError?: WikiError) {
    super(message);
    this.name = 'HelperAbort';
  }
}

const BRANCH = 'main';

/**
 * The remote-helper command loop: one command at a time from git on stdin,
 * responses on stdout.
 */
export class ProtocolSession {
  private phase: SessionPhase = 'idle';
  private connected: Promise<WikiResult<unknown>> | null = null;
  private verbosity: number;
  private progress = false;
  private dryRun = false;
  private depth?: number;
  private readonly settings: ProtocolSettings;

  constructor(private readonly options: ProtocolSessionOptions) {
    this.settings = options.settings;
    this.verbosity = options.settings.verbosity;
    this.depth = options.settings.depth;
  }

  get currentPhase(): SessionPhase {
    return this.phase;
  }

  private get privateRef(): string {
    return `${this.settings.privateRefPrefix}${BRANCH}`;
  }

  async run(): Promise<void> {
    await mkdir(this.settings.stateDir, { recursive: true });

    for (;;) {
      const line = await this.options.input.readLine();
      if (line === null) break;

      const command = parseCommand(line);
      logger.debug('Command', { line: line.replace(/\r$/, ''), phase: this.phase });

      switch (command.type) {
        case 'blank':
          // git ends the conversation with an empty line.
          return;
        case 'capabilities':
          await this.capabilities();
          break;
        case 'list':
          await this.list(command.forPush);
          break;
        case 'option':
          await this.send(this.option(command.name, command.value) + '\n');
          break;
        case 'import':
          await this.importBatch(command.ref);
          break;
        case 'export':
          await this.exportStream();
          break;
        case 'unknown':
          throw new HelperAbort(`Unknown command: ${command.line}`);
      }
    }
    logger.debug('Input closed');
  }

  private async capabilities(): Promise<void> {
    const lines = [
      'import',
      'export',
      `refspec refs/heads/*:${this.settings.privateRefPrefix}*`
    ];
    if (existsSync(this.settings.marksPath)) {
      lines.push(`*import-marks ${this.settings.marksPath}`);
    }
    lines.push(`*export-marks ${this.settings.marksPath}`);
    lines.push('option');
    await this.send(lines.join('\n') + '\n\n');
    this.phase = 'capabilities-declared';
  }

  private async list(forPush: boolean): Promise<void> {
    this.phase = 'listing';
    const ref = `refs/heads/${BRANCH}`;

    if (forPush) {
      const sha = await resolveRef(this.options.git, this.privateRef);
      await this.send(`${sha ?? '?'} ${ref}\n@${ref} HEAD\n\n`);
      this.phase = 'capabilities-declared';
      return;
    }

    await this.ensureConnected();
    if (!this.options.identity.head && await this.wikiIsEmpty()) {
      logger.info('Wiki namespace is empty');
      await this.send('\n');
    } else {
      await this.send(`? ${ref}\n@${ref} HEAD\n\n`);
    }
    this.phase = 'capabilities-declared';
  }

  private async wikiIsEmpty(): Promise<boolean> {
    const namespace = this.options.mapper.namespace;
    const pages = await this.options.remote.listPages(namespace);
    if (!pages.ok) throw new HelperAbort(`Listing failed: ${pages.error.message}`, pages.error);
    if (pages.value.some((page) => this.options.mapper.inScope(page.id))) return false;
    const media = await this.options.remote.listMedia(namespace);
    if (!media.ok) throw new HelperAbort(`Listing failed: ${media.error.message}`, media.error);
    return !media.value.some((file) => this.options.mapper.inScope(file.id));
  }

  option(name: string, value: string): string {
    switch (name) {
      case 'verbosity': {
        const level = Number(value);
        if (!Number.isInteger(level) || level < 0) return 'error invalid verbosity';
        // Only ever raised: DOKUWIKI_VERBOSE may already ask for more.
        if (level > this.verbosity) {
          this.verbosity = level;
          if (!this.settings.fixedLogLevel) logger.setLevel(levelForVerbosity(level));
        }
        return 'ok';
      }
      case 'progress':
        if (value !== 'true' && value !== 'false') return 'error invalid progress value';
        this.progress = value === 'true';
        return 'ok';
      case 'dry-run':
        if (value !== 'true' && value !== 'false') return 'error invalid dry-run value';
        this.dryRun = value === 'true';
        return 'ok';
      case 'depth': {
        const depth = Number(value);
        if (!Number.isInteger(depth) || depth < 1) return 'error invalid depth';
        this.depth = depth;
        return 'ok';
      }
      default:
        return 'unsupported';
    }
  }

  private async importBatch(firstRef: string): Promise<void> {
    this.phase = 'importing';
    const refs = [firstRef];
    for (;;) {
      const line = await this.options.input.readLine();
      if (line === null) break;
      const command = parseCommand(line);
      if (command.type === 'blank') break;
      if (command.type !== 'import') {
        throw new HelperAbort(`Unexpected command inside import batch: ${line}`);
      }
      refs.push(command.ref);
    }

    await this.ensureConnected();
    const { identity } = this.options;
    const writer = new FastImportWriter().header({ marksPath: this.settings.marksPath });
    let staged: { head: SyncHead | null; nextMark: number; squashedBases: SquashedBase[] } | null = null;

    for (const ref of refs) {
      if (ref !== `refs/heads/${BRANCH}`) {
        logger.warn('Ignoring import of unknown ref', { ref });
        continue;
      }
      if (staged) continue;

      const exporter = new HistoryExporter({
        remote: this.options.remote,
        mapper: this.options.mapper,
        identity,
        marks: await MarksFile.load(this.settings.marksPath),
        concurrency: this.settings.concurrency,
        depth: this.depth,
        privateRefExists: (await resolveRef(this.options.git, this.privateRef)) !== null,
        progress: createProgressReporter(this.progress)
      });
      const plan = await exporter.plan();
      if (!plan.ok) {
        // Ending without `done` makes fast-import, and so the fetch, fail.
        throw new HelperAbort(`Fetching ${ref} failed: ${plan.error.message}`, plan.error);
      }

      for (const commit of plan.value.commits) {
        writer.commit(this.privateRef, commit);
      }
      if (plan.value.commits.length > 0) {
        identity.stage(plan.value.entries);
        staged = {
          head: plan.value.head,
          nextMark: plan.value.nextMark,
          squashedBases: plan.value.squashedBases
        };
      }
      logger.info('Fetched revisions', { ref, commits: plan.value.commits.length });
    }

    writer.done();
    await this.send(writer.toBuffer());
    if (staged) {
      await identity.commitStaged(staged);
    }
    this.phase = 'capabilities-declared';
  }

  private async exportStream(): Promise<void> {
    this.phase = 'exporting';
    const stream = await new FastExportParser(this.options.input).parse();
    await this.ensureConnected();

    const importer = new PushImporter({
      remote: this.options.remote,
      mapper: this.options.mapper,
      identity: this.options.identity,
      conflictScope: this.settings.conflictScope,
      concurrency: this.settings.concurrency,
      dryRun: this.dryRun,
      progress: createProgressReporter(this.progress)
    });

    const outcomes = await importer.push(stream);
    const lines = outcomes.map((outcome) =>
      outcome.ok ? `ok ${outcome.ref}` : `error ${outcome.ref} ${quoteStatusMessage(outcome.reason)}`
    );
    if (outcomes.length === 0) {
      logger.debug('Nothing to push', { ref: PUSHABLE_REF });
    }
    await this.send(lines.map((line) => line + '\n').join('') + '\n');
    this.phase = 'capabilities-declared';
  }

  private async ensureConnected(): Promise<void> {
    if (!this.connected) {
      this.connected = this.options.connect ? this.options.connect() : Promise.resolve(ok(undefined));
    }
    const result = await this.connected;
    if (!result.ok) {
      throw new HelperAbort(describeError(result.error), result.error);
    }
  }

  private send(chunk: string | Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.options.output.write(chunk, (error?: Error | null) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}
