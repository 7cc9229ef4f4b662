/*
 * ArtifactCache
 * -------------
 * Owns the compiled-container files on disk.
 *
 * An artifact is written at most once: while `<directory>/<name>.cjs` exists
 * it is returned as is, without generating anything and without checking it
 * against the current definitions. Delete the file (or use another name) to
 * compile again.
 *
 * Writes go to a temp file in the same directory, then `rename` onto the
 * final path, so readers never see a partial artifact. When two processes
 * race, the first rename wins and the loser keeps the winner's file.
 */
import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { InvalidArtifactNameError } from '../errors/errors.js';
import reservedWords from './reserved-words.json';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const RESERVED = new Set<string>(reservedWords);

export const ARTIFACT_EXTENSION = '.cjs';

export interface ArtifactLocation {
  /** Directory artifacts are written to. Created when missing. */
  readonly directory: string;
  /** Generated class name, also the file name. */
  readonly name: string;
}

export interface Artifact {
  /** Absolute path of the artifact file. */
  readonly path: string;
  /** True when an existing file was used and nothing was generated. */
  readonly reused: boolean;
}

export function isValidArtifactName(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED.has(name);
}

export function artifactPath(location: ArtifactLocation): string {
  return path.resolve(location.directory, `${location.name}${ARTIFACT_EXTENSION}`);
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

export class ArtifactCache {
  /**
   * Path of the artifact for `location`, generating it with `build` if no
   * file exists yet.
   *
   * @param build - Produces the artifact source; only called on a miss
   * @throws InvalidArtifactNameError before touching the file system
   */
  obtain(location: ArtifactLocation, build: () => string): Artifact {
    if (!isValidArtifactName(location.name)) {
      throw new InvalidArtifactNameError(location.name);
    }

    const file = artifactPath(location);
    if (fs.existsSync(file)) return { path: file, reused: true };

    const directory = path.dirname(file);
    fs.mkdirSync(directory, { recursive: true });

    const source = build();
    const temp = path.join(directory, `.${location.name}.${process.pid}.${randomUUID()}.tmp`);
    try {
      fs.writeFileSync(temp, source, 'utf8');
      fs.renameSync(temp, file);
    } catch (e) {
      fs.rmSync(temp, { force: true });
      // Another writer got there first: its file is as good as ours
      if (fs.existsSync(file)) return { path: file, reused: true };
      throw e;
    }
    return { path: file, reused: false };
  }

  /**
   * Delete the artifact for `location`. Returns whether a file was removed.
   */
  invalidate(location: ArtifactLocation): boolean {
    try {
      fs.unlinkSync(artifactPath(location));
      return true;
    } catch (e) {
      if (isErrnoException(e) && e.code === 'ENOENT') return false;
      throw e;
    }
  }
}
