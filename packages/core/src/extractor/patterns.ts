/**
 * Regex source fragments shared by several recognizers.
 */

import { CHECKBOX_GLYPHS } from '../types/index.js';
import { escapeRegExp } from '../utils/normalize.js';

/**
 * Any checkbox glyph, for use against lowercased text.
 */
export const CHECKBOX = `(?:${CHECKBOX_GLYPHS.map(escapeRegExp).join('|')})`;

/**
 * Lazy run of name characters on a single line.
 */
export const PERSON_NAME = "[A-Za-z'’.\\- \\t]+?";

/**
 * Lazy run of event-title characters on a single line.
 */
export const EVENT_TITLE = "[A-Za-z'’& \\t]+?";

/**
 * Kindergarten and grades 1-5, e.g. "K", "Pre-K", "Kindergarten", "3", "3rd".
 */
export const GRADE_TOKEN = '(?:Pre-?)?K(?:indergarten)?|[1-5](?:st|nd|rd|th)?';

/**
 * Courtesy title preceding a teacher's surname.
 */
export const COURTESY_TITLE = '(?:Mrs?\\.?|Ms\\.?|Miss)';

/**
 * Labels of other form fields; a capture running into one of these stops.
 */
export const FIELD_LABEL_WORDS = [
    'Email',
    'Phone',
    'Child',
    'Student',
    'Event',
    'Amount',
    'Payable',
    'Delivery',
    'Reimbursement',
    'Date',
] as const;

export const FIELD_LABEL = `(?:${FIELD_LABEL_WORDS.join('|')})`;
