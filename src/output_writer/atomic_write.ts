// src/output_writer/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

import type { FsyncMode } from "../config";
import { FileAccessError, fileErrorFromErrno } from "../structured_error";

function errnoOf(e: unknown): string | undefined {
    return e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

export interface WriteTextResult {
    bytes: number;
}

/**
 * Write `content` to `filePath` through a temp file and rename, overwriting
 * any existing file. The parent directory must already exist.
 */
export function writeTextFileSync(params: {
    filePath: string;
    content: string;
    fsyncMode: FsyncMode;
    warnings: string[];
    mode?: number;
}): WriteTextResult {
    const { filePath, content, fsyncMode, warnings } = params;
    const mode = params.mode ?? 0o644;
    const dir = path.dirname(filePath);

    let dirStat: fs.Stats;
    try {
        dirStat = fs.statSync(dir);
    } catch (e) {
        throw fileErrorFromErrno(e, filePath, "write");
    }
    if (!dirStat.isDirectory()) {
        throw new FileAccessError(
            `Output directory does not exist for ${filePath}`,
            "OUTPUT_DIR_MISSING",
            { path: filePath, parent: dir }
        );
    }

    const tmp = path.join(dir, `.${path.basename(filePath)}.tmp.${crypto.randomBytes(4).toString("hex")}`);
    const data = Buffer.from(content, "utf8");

    try {
        fs.writeFileSync(tmp, data, { mode: 0o600 });

        syncPath(tmp, "r+", fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        syncPath(dir, "r", fsyncMode, warnings);
    } catch (e) {
        removeTemp(tmp, warnings);
        if (e instanceof FileAccessError) throw e;
        throw fileErrorFromErrno(e, filePath, "write");
    }

    return { bytes: data.length };
}

function syncPath(target: string, flags: "r" | "r+", fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            if (flags === "r+") fs.fdatasyncSync(fd);
            else fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoOf(e);

        if (fsyncMode === "REQUIRED") throw e;
        if (isFatalBestEffort(code)) throw e;

        warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${target}`);
    }
}

function removeTemp(tmp: string, warnings: string[]): void {
    try {
        if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
    } catch (e) {
        warnings.push(`TEMP_CLEANUP_FAILED(${errnoOf(e) || "UNKNOWN"}) on ${tmp}`);
    }
}
