import { runCascade } from '../cascade.js';
import { PERSON_NAME } from '../patterns.js';
import type { CaptureRule, FieldMatch } from '../types.js';

export const CHILD_NAME_RULES: readonly CaptureRule[] = [
    {
        name: 'child-name-label',
        pattern: new RegExp(`Child(?:['’]s)?\\s+Name[\\s:]+(${PERSON_NAME})(?:\\n|$|Teacher|Grade)`, 'i'),
    },
    {
        name: 'student-name-label',
        pattern: new RegExp(`Student(?:['’]s)?\\s+Name[\\s:]+(${PERSON_NAME})(?:\\n|$|Teacher|Grade)`, 'i'),
    },
    {
        // Bare "Child" label; must stay on its line so "send home with child" is not a label
        name: 'child-label',
        pattern: new RegExp(`\\bChild[ \\t]*[: \\t][ \\t]*(${PERSON_NAME})(?:\\n|$)`, 'i'),
    },
];

export function recognizeChildName(text: string): FieldMatch {
    return runCascade(text, CHILD_NAME_RULES);
}
