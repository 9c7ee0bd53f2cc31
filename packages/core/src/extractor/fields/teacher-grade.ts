/**
 * Teacher / grade recognizer.
 *
 * Templates disagree on how this field is laid out, so it resolves through
 * five tiers, each returning on success:
 * 1. combined "Teacher / Grade" label
 * 2. separate Teacher and Grade labels, joined as "<teacher> - <grade>"
 * 3. Teacher label alone
 * 4. Grade label alone
 * 5. unlabeled courtesy title + surname next to a grade token
 *
 * Handles values such as "Mrs. Lanford 5th", "K Michaud", "McCord / 3rd"
 * and "5th - Johnson".
 */

import { acceptCapture, runCascade } from '../cascade.js';
import { COURTESY_TITLE, FIELD_LABEL, GRADE_TOKEN } from '../patterns.js';
import { NO_MATCH } from '../types.js';
import type { CaptureRule, FieldMatch } from '../types.js';

export const COMBINED_LABEL_RULES: readonly CaptureRule[] = [
    {
        // Rest of the label's own line, stopping early at another "Label:" on it.
        // A blank combined label never reads the next line.
        name: 'teacher-grade-label',
        pattern: new RegExp(
            `Teacher\\s*/\\s*Grade[ \\t]*:?[ \\t]*(?!${FIELD_LABEL}[ \\t]*:)(\\S[^\\n]*?)(?=[ \\t]+${FIELD_LABEL}[ \\t]*:|[ \\t]*(?:\\n|$))`,
            'i'
        ),
    },
];

/**
 * "Teacher" also appears as option text ("Teacher reimbursement",
 * "teacher mailbox"); those are not labels.
 */
const TEACHER_OPTION_WORDS = '(?:reimbursement|mailbox|appreciation|/)';

export const TEACHER_LABEL_RULES: readonly CaptureRule[] = [
    {
        name: 'teacher-label',
        pattern: /\bTeacher(?:['’]s)?(?:\s+Name)?[ \t]*:[ \t]*([A-Za-z][A-Za-z.,'’ \t]*?)[ \t]*(?=\n|$)/i,
        minLength: 1,
    },
    {
        name: 'teacher-line',
        pattern: new RegExp(
            `^[ \\t]*Teacher[ \\t]+(?!${TEACHER_OPTION_WORDS})([A-Za-z][A-Za-z.,'’ \\t]*?)[ \\t]*$`,
            'im'
        ),
        minLength: 1,
    },
];

export const GRADE_LABEL_RULES: readonly CaptureRule[] = [
    {
        name: 'grade-label',
        pattern: /(?<!\/\s*)\bGrade[ \t]*:[ \t]*([A-Za-z0-9][A-Za-z0-9 \t-]*?)[ \t]*(?=\n|$)/i,
        minLength: 1,
    },
    {
        name: 'grade-line',
        pattern: /^[ \t]*Grade[ \t]+([A-Za-z0-9][A-Za-z0-9 \t-]*?)[ \t]*$/im,
        minLength: 1,
    },
];

export const UNLABELED_RULES: readonly CaptureRule[] = [
    {
        name: 'title-then-grade',
        pattern: new RegExp(
            `\\b(${COURTESY_TITLE}\\s+[A-Z][a-z]+)[ \\t,/-]+(${GRADE_TOKEN}(?:[ \\t]*grade)?)\\b`,
            'i'
        ),
        compose: (match) => `${match[1]} - ${match[2]}`,
    },
    {
        // Case-sensitive: the name must be capitalized
        name: 'grade-then-name',
        pattern: new RegExp(
            `\\b(${GRADE_TOKEN})\\b[ \\t,/-]+((?:${COURTESY_TITLE}[ \\t]+)?[A-Z][a-z]+(?:[ \\t]+[A-Z][a-z]+)?)`
        ),
        compose: (match) => `${match[1]} ${match[2]}`,
    },
];

/**
 * A tier of the teacher/grade fallback chain.
 */
interface Tier {
    name: string;
    resolve: (text: string) => FieldMatch;
}

/**
 * Accept a label capture that resolved at a relaxed length only if it also
 * passes the standard length check.
 */
function standalone(match: FieldMatch): FieldMatch {
    if (match.rule === null) return NO_MATCH;
    const value = acceptCapture(match.value);
    return value === null ? NO_MATCH : { value, rule: match.rule };
}

export const TEACHER_GRADE_TIERS: readonly Tier[] = [
    {
        name: 'combined-label',
        resolve: (text) => runCascade(text, COMBINED_LABEL_RULES),
    },
    {
        name: 'separate-labels',
        resolve: (text) => {
            const teacher = runCascade(text, TEACHER_LABEL_RULES);
            const grade = runCascade(text, GRADE_LABEL_RULES);
            if (teacher.rule === null || grade.rule === null) return NO_MATCH;
            return {
                value: `${teacher.value} - ${grade.value}`,
                rule: `${teacher.rule}+${grade.rule}`,
            };
        },
    },
    {
        name: 'teacher-only',
        resolve: (text) => standalone(runCascade(text, TEACHER_LABEL_RULES)),
    },
    {
        name: 'grade-only',
        resolve: (text) => standalone(runCascade(text, GRADE_LABEL_RULES)),
    },
    {
        name: 'unlabeled',
        resolve: (text) => runCascade(text, UNLABELED_RULES),
    },
];

export function recognizeTeacherGrade(text: string): FieldMatch {
    for (const tier of TEACHER_GRADE_TIERS) {
        const match = tier.resolve(text);
        if (match.rule !== null) {
            return match;
        }
    }
    return NO_MATCH;
}
