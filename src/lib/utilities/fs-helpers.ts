import fs from 'node:fs';
import path from 'node:path';

/**
 * Write a file so readers only ever see the old content or the complete new content.
 * Data goes to a sibling temp file that is renamed over the target; the temp file
 * is removed if anything fails. Parent directories are created.
 */
export function writeFileAtomic(filePath: string, data: string): void {
    const target = path.resolve(filePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });

    const tmp = `${target}.${process.pid}.tmp`;
    try {
        fs.writeFileSync(tmp, data, 'utf8');
        fs.renameSync(tmp, target);
    } catch (err) {
        fs.rmSync(tmp, { force: true });
        throw err;
    }
}
