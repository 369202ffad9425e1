/**
 * Input format detection from filename.
 *
 * Only the extension is consulted. Unknown extensions are rejected before
 * any bytes are decoded.
 */

import type { InputFormat } from '../types/index.js';
import { SUPPORTED_EXTENSIONS, UnsupportedFormatError } from '../types/index.js';

type SupportedExtension = keyof typeof SUPPORTED_EXTENSIONS;

/**
 * Detect the input format for a filename.
 *
 * @param filename - Base filename or path
 * @returns Format used to pick the decoding path
 * @throws UnsupportedFormatError when the extension is not recognized
 */
export function detectFormat(filename: string): InputFormat {
    const extension = getExtension(filename);
    if (!isSupportedExtension(extension)) {
        throw new UnsupportedFormatError(extension);
    }
    return SUPPORTED_EXTENSIONS[extension];
}

/**
 * Lower-cased final extension including the dot, or '' when there is none.
 * Dotfiles such as ".csv" have no extension.
 */
export function getExtension(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? '';
    const dot = base.lastIndexOf('.');
    if (dot <= 0 || dot === base.length - 1) {
        return '';
    }
    return base.slice(dot).toLowerCase();
}

/**
 * Get list of accepted extensions, in declaration order.
 */
export function getSupportedExtensions(): string[] {
    return Object.keys(SUPPORTED_EXTENSIONS);
}

function isSupportedExtension(extension: string): extension is SupportedExtension {
    return Object.prototype.hasOwnProperty.call(SUPPORTED_EXTENSIONS, extension);
}
