import { readFile, realpath } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ValidationError } from '../errors.js';
import { msg } from '../lib/error-messages.js';
import type { DocumentLoader } from './plain-text.js';

const URI_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * The directory documents are read from. Relative paths resolve against it;
 * absolute paths and `file:` URLs must already point inside it.
 */
export class DocumentRoot {
  readonly path: string;

  constructor(root: string) {
    this.path = resolve(root);
  }

  resolve(uri: string): string {
    let path = uri;
    if (uri.startsWith('file:')) {
      try {
        path = fileURLToPath(uri);
      } catch {
        throw new ValidationError(msg('DOCUMENT_URI_UNSUPPORTED'), { uri });
      }
    } else if (URI_SCHEME.test(uri)) {
      throw new ValidationError(msg('DOCUMENT_URI_UNSUPPORTED'), { uri });
    }

    const target = resolve(this.path, path);
    if (!isInside(this.path, target)) {
      throw new ValidationError(msg('DOCUMENT_OUTSIDE_ROOT'), { uri });
    }
    return target;
  }

  // Symlinks are followed before the containment check is repeated
  readonly load: DocumentLoader = async (uri, signal) => {
    const target = this.resolve(uri);
    const [root, real] = await Promise.all([realpath(this.path), realpath(target)]);
    if (!isInside(root, real)) {
      throw new ValidationError(msg('DOCUMENT_OUTSIDE_ROOT'), { uri });
    }
    return readFile(real, { signal });
  };
}
