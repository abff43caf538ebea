/**
 * @file doxygen-runner.ts
 * @module doxygen/doxygen-runner
 * @license MIT
 *
 * @fileoverview Decides from file timestamps whether the Doxygen XML is out
 * of date, and regenerates it.
 */

import { spawnSync } from 'node:child_process';
import { existsSync, readdirSync, statSync, utimesSync } from 'node:fs';
import { join } from 'node:path';
import type { Reporter } from '../shared/reporter.js';

/**
 * A file and its modification time in milliseconds since the epoch.
 */
export interface StampedFile {
    path: string;
    mtimeMs: number;
}

export interface RegenerationCheck {
    needed: boolean;
    /** Most recently modified header, null if there are none */
    newestHeader: StampedFile | null;
    /** Least recently modified XML file, null if there are none */
    oldestXml: StampedFile | null;
}

/**
 * Format a timestamp as `YYYY-MM-DD HH:MM:SS.ffffff` in local time, or
 * `N/A` for a missing one.
 */
export function formatTimestamp(mtimeMs: number | null): string {
    if (mtimeMs === null || !Number.isFinite(mtimeMs)) {
        return 'N/A';
    }
    const date = new Date(Math.floor(mtimeMs));
    const pad = (n: number, width: number = 2) => String(n).padStart(width, '0');
    const micros = Math.floor((mtimeMs - Math.floor(mtimeMs / 1000) * 1000) * 1000);
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(micros, 6)}`;
}

function walkFiles(dir: string): string[] {
    if (!existsSync(dir)) {
        return [];
    }
    const files: string[] = [];
    for (const name of readdirSync(dir)) {
        if (name.startsWith('.')) {
            continue;
        }
        const path = join(dir, name);
        const stats = statSync(path);
        if (stats.isDirectory()) {
            files.push(...walkFiles(path));
        } else if (stats.isFile()) {
            files.push(path);
        }
    }
    return files;
}

function extreme(paths: string[], pick: (a: number, b: number) => boolean): StampedFile | null {
    let best: StampedFile | null = null;
    for (const path of paths) {
        const mtimeMs = statSync(path).mtimeMs;
        if (best === null || pick(mtimeMs, best.mtimeMs)) {
            best = { path, mtimeMs };
        }
    }
    return best;
}

/**
 * Compare the newest tracked header (`*.hpp`) with the oldest generated XML
 * file. Regeneration is needed when the XML directory is missing or empty,
 * or when any header changed after the XML was written.
 */
export function checkRegeneration(headersDir: string, xmlDir: string): RegenerationCheck {
    const headers = walkFiles(headersDir).filter(path => path.endsWith('.hpp'));
    const newestHeader = extreme(headers, (a, b) => a > b);
    if (!existsSync(xmlDir)) {
        return { needed: true, newestHeader, oldestXml: null };
    }
    const oldestXml = extreme(walkFiles(xmlDir), (a, b) => a < b);
    if (oldestXml === null) {
        return { needed: true, newestHeader, oldestXml };
    }
    const needed = newestHeader !== null && oldestXml.mtimeMs < newestHeader.mtimeMs;
    return { needed, newestHeader, oldestXml };
}

/**
 * Print the timestamps a {@link RegenerationCheck} was based on.
 */
export function reportRegenerationCheck(check: RegenerationCheck, reporter: Reporter): void {
    if (check.oldestXml === null) {
        reporter.info('No generated XML found!');
    }
    reporter.info(
        `The last changed header file is:\t${check.newestHeader?.path ?? ''}\n`
        + `Last modified:\t\t\t\t${formatTimestamp(check.newestHeader?.mtimeMs ?? null)}`
    );
    reporter.info(
        `The first built xml file is:\t\t${check.oldestXml?.path ?? ''}\n`
        + `last modified:\t\t\t\t${formatTimestamp(check.oldestXml?.mtimeMs ?? null)}`
    );
}

/**
 * Run the Doxygen command and wait for it, then touch every XML file in
 * `xmlDir` so they all count as newer than the headers.
 *
 * The exit status is returned and logged but not acted upon.
 *
 * @returns Exit status, or null if the process was killed or not started
 */
export function runDoxygen(command: string, cwd: string, xmlDir: string, reporter: Reporter): number | null {
    reporter.dimmed('Running doxygen!');
    const result = spawnSync(command, { cwd, shell: true, stdio: 'inherit' });
    if (result.error) {
        reporter.dimmed(`${command} could not be started: ${result.error.message}`);
    } else if (result.status !== 0) {
        reporter.dimmed(`${command} exited with status ${result.status}`);
    }

    const now = new Date();
    if (existsSync(xmlDir)) {
        for (const name of readdirSync(xmlDir)) {
            if (name.endsWith('.xml')) {
                utimesSync(join(xmlDir, name), now, now);
            }
        }
    }
    return result.status;
}
