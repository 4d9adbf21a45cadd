import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { ACCEPTED_EXTENSIONS } from '../constants.js';
import { describeError, IngestionError } from '../errors.js';
import Logger from '../logger.js';

const accepted: readonly string[] = ACCEPTED_EXTENSIONS;

export type GeoJsonSource =
    | { kind: 'file'; path: string }
    | { kind: 'url'; url: string; headers?: HeadersInit }
    | { kind: 'text'; text: string };

/** A URL is usable when it names both a scheme and a host. */
export function isValidUrl(text: string): boolean {
    try {
        const url = new URL(text);
        return url.protocol.length > 1 && url.host.length > 0;
    } catch {
        return false;
    }
}

function parseJson(text: string, source: string): unknown {
    try {
        return JSON.parse(text);
    } catch (e) {
        throw new IngestionError(`Error parsing GeoJSON from ${source}: ${describeError(e)}`, source, e);
    }
}

export function readFromText(text: string): unknown {
    if (text.trim().length === 0) throw new IngestionError('No GeoJSON text given', 'text');
    return parseJson(text, 'text');
}

export async function readFromFile(path: string): Promise<unknown> {
    const extension = extname(path).toLowerCase();
    if (!accepted.includes(extension)) {
        throw new IngestionError(
            `Unsupported file type "${extension || path}", expected one of ${ACCEPTED_EXTENSIONS.join(', ')}`,
            path,
        );
    }
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (e) {
        throw new IngestionError(`Error reading file ${path}: ${describeError(e)}`, path, e);
    }
    Logger.debug(`read ${text.length} characters from ${path}`);
    return parseJson(text, path);
}

/**
 * Fetch GeoJSON with a single GET. The URL is checked before any request is
 * made and failed requests are not retried.
 */
export async function readFromUrl(url: string, headers: HeadersInit = {}): Promise<unknown> {
    if (!isValidUrl(url)) throw new IngestionError(`Invalid URL "${url}"`, url);

    Logger.debug(`request: GET ${url}`);
    let response: Response;
    let text: string;
    try {
        response = await fetch(url, { headers });
        text = await response.text();
    } catch (e) {
        throw new IngestionError(`Error loading GeoJSON from URL: ${describeError(e)}`, url, e);
    }
    if (!response.ok) {
        throw new IngestionError(`Error loading GeoJSON from URL: HTTP ${response.status} ${response.statusText}`, url);
    }
    Logger.debug(`response: ${response.status}, ${text.length} characters`);
    return parseJson(text, url);
}

export async function ingest(source: GeoJsonSource): Promise<unknown> {
    switch (source.kind) {
        case 'file':
            return readFromFile(source.path);
        case 'url':
            return readFromUrl(source.url, source.headers);
        case 'text':
            return readFromText(source.text);
    }
}
