import { OUTPUT_STORE } from '@gst-summarizer/shared';

/**
 * Reduce a user-supplied filename to a safe ASCII name.
 *
 * - accents are decomposed and non-ASCII dropped
 * - path separators and whitespace runs become '_'
 * - anything outside [A-Za-z0-9_.-] is removed
 * - leading/trailing '.' and '_' are stripped
 *
 * May return '' (e.g. for "../..").
 */
export function secureFilename(name: string): string {
    const ascii = name.normalize('NFKD').replace(/[^\x00-\x7F]/g, '');
    const joined = ascii
        .replace(/[\\/]/g, ' ')
        .split(/\s+/)
        .filter(Boolean)
        .join('_');
    return joined.replace(/[^A-Za-z0-9_.-]/g, '').replace(/^[._]+|[._]+$/g, '');
}

/**
 * Filename without directory and final extension.
 */
export function fileStem(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? '';
    const dot = base.lastIndexOf('.');
    return dot > 0 ? base.slice(0, dot) : base;
}

/**
 * Name offered for a saved output: "{stem}_modified.xlsx".
 */
export function downloadName(originalName: string): string {
    const stem = secureFilename(fileStem(originalName)) || 'result';
    return `${stem}${OUTPUT_STORE.OUTPUT_SUFFIX}`;
}
