/**
 * Delivery preference classifier.
 * Checked boxes win over bare keyword mentions.
 */

import { DELIVERY_OPTIONS } from '../../types/index.js';
import { classify } from '../cascade.js';
import { CHECKBOX } from '../patterns.js';
import type { CategoryRule, FieldMatch } from '../types.js';

export type DeliveryOption = (typeof DELIVERY_OPTIONS)[number];

const [MAILBOX, SEND_HOME, PICKUP] = DELIVERY_OPTIONS;

export const DELIVERY_RULES: readonly CategoryRule<DeliveryOption>[] = [
    {
        name: 'checkbox-mailbox',
        pattern: new RegExp(`${CHECKBOX}\\s*(?:teacher['’]?s?\\s*)?mailbox`),
        value: MAILBOX,
    },
    {
        name: 'checkbox-send-home',
        pattern: new RegExp(`${CHECKBOX}\\s*send\\s*home\\s*with\\s*child`),
        value: SEND_HOME,
    },
    {
        name: 'checkbox-pickup',
        pattern: new RegExp(`${CHECKBOX}\\s*(?:i['’]?ll\\s*)?pick\\s*(?:it\\s*)?up`),
        value: PICKUP,
    },
    { name: 'mailbox-keyword', pattern: /mailbox/, value: MAILBOX },
    { name: 'send-home-keyword', pattern: /send\s*home/, value: SEND_HOME },
    { name: 'pickup-keyword', pattern: /pick\s*up/, value: PICKUP },
];

export function recognizeDelivery(text: string): FieldMatch {
    return classify(text, DELIVERY_RULES);
}
