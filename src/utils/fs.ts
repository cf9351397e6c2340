import { access, stat } from 'node:fs/promises';

export async function pathExists(target: string): Promise<boolean> {
    try {
        await access(target);
        return true;
    } catch {
        return false;
    }
}

export async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await stat(target)).isDirectory();
    } catch {
        return false;
    }
}

export async function isFile(target: string): Promise<boolean> {
    try {
        return (await stat(target)).isFile();
    } catch {
        return false;
    }
}

export function isNotFound(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
