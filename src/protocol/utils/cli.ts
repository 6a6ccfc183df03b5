/**
 * CLI Formatting Utility
 *
 * Boxes and tables for shardswap command output. figures/log-symbols fall
 * back to ASCII on terminals without Unicode.
 */

import chalk from 'chalk';
import boxen, { type Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    // Status
    success: logSymbols.success,
    error: logSymbols.error,
    info: logSymbols.info,

    bullet: figures.bullet,

    // Custom emojis (no fallback)
    pool: '🏊',
    tree: '🌳',
    gift: '🎁',
    box: '📦',
    swap: '💱',
    lock: '🔒',
    clock: '⏰',
    check: '✅',
};

// ==================== COLORS ====================

export const c = {
    dim: chalk.dim,
    label: chalk.gray,
    value: chalk.white,
};

// ==================== BOX STYLES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    titleAlignment: 'center',
};

export function successBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'green',
        title: title || `${sym.success} Success`,
    });
}

export function errorBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'red',
        title: title || `${sym.error} Error`,
    });
}

export function infoBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'blue',
        title: title || `${sym.info} Info`,
    });
}

// ==================== LINES ====================

/**
 * Aligned `label: value` lines for a box body.
 */
export function table(rows: Array<[string, string]>): string {
    const width = Math.max(0, ...rows.map(([label]) => label.length)) + 1;
    return rows.map(([label, value]) => `${c.label(`${label}:`.padEnd(width))} ${c.value(value)}`).join('\n');
}

export default {
    sym,
    c,
    successBox,
    errorBox,
    infoBox,
    table,
};
