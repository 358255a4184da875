import { AmbiguousMappingError } from '../core/errors.js';
import { err, ok, type Result } from '../core/result.js';

export type FileKind = 'page' | 'media';

export interface PathMapperOptions {
  /** Root namespace of the clone, `''` for the whole wiki. Accepts `a:b` or `a/b`. */
  namespace?: string;
  /** Page file extension, with or without the leading dot. */
  extension: string;
}

export interface WikiTarget {
  id: string;
  kind: FileKind;
}

const NAMESPACE_SEPARATOR = ':';
// A segment DokuWiki stores unchanged: lowercase, no leading/trailing
// separators, no doubled underscores.
const CANONICAL_SEGMENT = /^[a-z0-9](?:[a-z0-9_.-]*[a-z0-9])?$/;

export function normalizeNamespace(namespace: string | undefined): string {
  if (!namespace) return '';
  return namespace
    .replace(/\//g, NAMESPACE_SEPARATOR)
    .split(NAMESPACE_SEPARATOR)
    .filter((segment) => segment.length > 0)
    .join(NAMESPACE_SEPARATOR);
}

function extensionOf(path: string): string {
  const base = path.slice(path.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1) : '';
}

/**
 * Converts between wiki ids and repository paths.
 *
 * `wiki:syntax` becomes `wiki/syntax.md` for a page and `wiki/logo.png`
 * stays `wiki/logo.png` for media. Ids outside the root namespace have no
 * path.
 */
export class PathMapper {
  readonly namespace: string;
  readonly extension: string;

  constructor(options: PathMapperOptions) {
    this.namespace = normalizeNamespace(options.namespace);
    this.extension = options.extension.replace(/^\./, '');
  }

  inScope(id: string): boolean {
    return this.namespace === '' || id.startsWith(this.namespace + NAMESPACE_SEPARATOR);
  }

  toPath(id: string, kind: FileKind): string | null {
    if (!this.inScope(id)) return null;
    const relative = this.namespace === '' ? id : id.slice(this.namespace.length + 1);
    if (relative.length === 0) return null;
    const path = relative.split(NAMESPACE_SEPARATOR).join('/');
    return kind === 'page' ? `${path}.${this.extension}` : path;
  }

  /**
   * A path is a page iff its extension equals the page extension exactly;
   * everything else, including extension-less paths, is media.
   */
  classify(path: string): FileKind {
    return extensionOf(path) === this.extension ? 'page' : 'media';
  }

  toWikiId(path: string): WikiTarget {
    const kind = this.classify(path);
    const base = kind === 'page' ? path.slice(0, -(this.extension.length + 1)) : path;
    const relative = base.split('/').join(NAMESPACE_SEPARATOR);
    const id = this.namespace === '' ? relative : `${this.namespace}${NAMESPACE_SEPARATOR}${relative}`;
    return { id, kind };
  }

  /**
   * True when the wiki would store the path's id unchanged, so the next
   * fetch maps it back to the same path.
   */
  isCanonicalPath(path: string): boolean {
    const { id, kind } = this.toWikiId(path);
    const segments = id.split(NAMESPACE_SEPARATOR);
    if (kind === 'media' && extensionOf(path) === '') return false;
    return segments.every((segment) => CANONICAL_SEGMENT.test(segment) && !segment.includes('__'));
  }
}

/**
 * Tracks path ownership during one export so two wiki identities can never
 * silently share a file.
 */
export class PathRegistry {
  private readonly owners = new Map<string, string>();

  claim(path: string, owner: string): Result<void, AmbiguousMappingError> {
    const existing = this.owners.get(path);
    if (existing !== undefined && existing !== owner) {
      return err(new AmbiguousMappingError(
        `Wiki entries "${existing}" and "${owner}" both map to ${path}`,
        { path, wikiId: owner }
      ));
    }
    this.owners.set(path, owner);
    return ok(undefined);
  }

  ownerOf(path: string): string | undefined {
    return this.owners.get(path);
  }
}
