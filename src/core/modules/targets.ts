import type { Kwargs } from './types';

export const TARGET_SEPARATOR = '.';

export interface ParsedTarget {
    moduleName: string;
    methodName: string;
}

/**
 * A qualified target (`module.method`) addresses one module; a bare one is an event name.
 */
export function isQualifiedTarget(target: string): boolean {
    return target.includes(TARGET_SEPARATOR);
}

/**
 * Splits at the first separator; the method part may itself contain dots.
 */
export function parseTarget(target: string): ParsedTarget {
    const index = target.indexOf(TARGET_SEPARATOR);
    if (index === -1) {
        return { moduleName: target, methodName: '' };
    }
    return {
        moduleName: target.slice(0, index),
        methodName: target.slice(index + TARGET_SEPARATOR.length),
    };
}

/**
 * Renders `target(kwargs)` for log lines.
 */
export function describeCall(target: string, kwargs: Kwargs = {}): string {
    let args: string;
    try {
        args = JSON.stringify(kwargs) ?? '';
    } catch (e) {
        args = '[unserializable]';
    }
    return `${target}(${args})`;
}
