import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Write `data` to `target` through a temporary sibling and a rename, so a
 * failed run never leaves a partial file at `target`.
 */
export async function writeFileAtomic(target: string, data: Uint8Array): Promise<void> {
    const tmpPath = path.join(
        path.dirname(target),
        `.${path.basename(target)}.${process.pid}.${Math.random().toString(36).slice(2, 8)}.tmp`
    );

    try {
        await fs.writeFile(tmpPath, data);
        await fs.rename(tmpPath, target);
    } catch (err: unknown) {
        await fs.rm(tmpPath, { force: true });
        throw err;
    }
}

export async function readInputFile(file: string): Promise<Uint8Array> {
    return new Uint8Array(await fs.readFile(file));
}
