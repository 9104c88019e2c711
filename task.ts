import { parseInteger } from './numbers';
import { Task } from './types';

/**
 * Matches a compressed task range, e.g. "40-55:5" (tasks 40 to 55 in steps of 5).
 * Unanchored: the range may be embedded in a longer string.
 */
export const TASK_RANGE_PATTERN = /\d+-\d+:\d+/;

/**
 * Decodes the text of a <tasks> element. Anything containing a colon is kept
 * verbatim as a range; everything else must be an integer task id.
 */
export function decodeTask(text: string): Task {
    if (text.includes(':')) {
        return { kind: 'range', source: text, taskID: 0 };
    }
    return { kind: 'id', source: text, taskID: parseInteger(text) };
}

/**
 * Renders a task back to its element text. Ranges are written as they were read,
 * never recomputed. A task id of 0 means "no task" and yields undefined.
 */
export function encodeTask(task: Task): string | undefined {
    switch (task.kind) {
        case 'range':
            return task.source;
        case 'id':
            return task.taskID === 0 ? undefined : String(task.taskID);
    }
}
