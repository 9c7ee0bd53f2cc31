/**
 * Reimbursement type classifier (Home Room Parent, Teacher, PTA Program).
 *
 * Checked boxes are tried first, then "<category> reimbursement" phrases,
 * then a "Reimbursement Type:" label. Patterns run against lowercased text.
 */

import { REIMBURSEMENT_TYPES } from '../../types/index.js';
import { classify } from '../cascade.js';
import { CHECKBOX } from '../patterns.js';
import type { CategoryRule, FieldMatch } from '../types.js';

export type ReimbursementType = (typeof REIMBURSEMENT_TYPES)[number];

const [HOME_ROOM, TEACHER, PTA_PROGRAM] = REIMBURSEMENT_TYPES;

export const REIMBURSEMENT_TYPE_RULES: readonly CategoryRule<ReimbursementType>[] = [
    { name: 'checkbox-home-room', pattern: new RegExp(`${CHECKBOX}\\s*home\\s*room`), value: HOME_ROOM },
    { name: 'checkbox-teacher', pattern: new RegExp(`${CHECKBOX}\\s*teacher`), value: TEACHER },
    { name: 'checkbox-pta-program', pattern: new RegExp(`${CHECKBOX}\\s*pta\\s*program`), value: PTA_PROGRAM },
    { name: 'home-room-phrase', pattern: /home\s*room\s*parent\s*reimbursement/, value: HOME_ROOM },
    { name: 'teacher-phrase', pattern: /teacher\s*reimbursement/, value: TEACHER },
    { name: 'pta-program-phrase', pattern: /pta\s*program\s*reimbursement/, value: PTA_PROGRAM },
    { name: 'type-label-home-room', pattern: /reimbursement\s*type[\s:]*home\s*room/, value: HOME_ROOM },
    { name: 'type-label-teacher', pattern: /reimbursement\s*type[\s:]*teacher/, value: TEACHER },
    { name: 'type-label-pta', pattern: /reimbursement\s*type[\s:]*pta/, value: PTA_PROGRAM },
];

export function recognizeReimbursementType(text: string): FieldMatch {
    return classify(text, REIMBURSEMENT_TYPE_RULES);
}
