/**
 * @fileoverview Artifact Output Module
 * Writes artifacts in two steps so a failed run leaves nothing half-written:
 * `stage()` writes a temp file beside the target, `commit()` renames it into
 * place, and `discard()` removes whichever of the two currently exists.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { RenderError } from './errors.js';

export interface StagedArtifact {
    /** Final destination */
    readonly path: string;
    commit(): Promise<void>;
    /**
     * Removes the temp file, or the target once committed. Used to roll back
     * a run whose later artifacts failed.
     */
    discard(): Promise<void>;
}

export interface ArtifactWriter {
    stage(targetPath: string, data: string | Buffer): Promise<StagedArtifact>;
}

function tempPathFor(targetPath: string): string {
    const dir = path.dirname(targetPath);
    const base = path.basename(targetPath);
    return path.join(dir, `.${base}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
}

/**
 * Writer backed by the local file system.
 */
export function createFileArtifactWriter(): ArtifactWriter {
    return {
        async stage(targetPath, data) {
            const tempPath = tempPathFor(targetPath);
            try {
                await mkdir(path.dirname(targetPath), { recursive: true });
            } catch (error) {
                throw new RenderError(`Cannot create directory for ${targetPath}`, { cause: error });
            }

            try {
                await writeFile(tempPath, data);
            } catch (error) {
                await rm(tempPath, { force: true });
                throw new RenderError(`Cannot write ${targetPath}`, { cause: error });
            }

            let committed = false;
            return {
                path: targetPath,
                async commit() {
                    try {
                        await rename(tempPath, targetPath);
                        committed = true;
                    } catch (error) {
                        await rm(tempPath, { force: true });
                        throw new RenderError(`Cannot move ${targetPath} into place`, { cause: error });
                    }
                },
                async discard() {
                    await rm(committed ? targetPath : tempPath, { force: true });
                },
            };
        },
    };
}
