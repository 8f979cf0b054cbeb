/**
 * Callback Data Codec
 *
 * Inline button payloads are limited to 64 bytes, so actions travel as short
 * colon-separated strings:
 *
 *   nav:back | nav:home | nav:admin | go:<screen>
 *   flow:start | flow:pick:<value> | flow:toggle:<addon> | flow:addons:<a,b>
 *   flow:back | flow:finalize | cart:clear
 *   draft:start | draft:input:<text> | draft:back | draft:save | draft:cancel
 */

import { isScreenKey } from '@petal/core/domain';
import type { InboundAction } from '@petal/core/ports';

export function encodeAction(action: InboundAction): string {
  switch (action.type) {
    case 'enter_screen':
      return `go:${action.target}`;
    case 'nav_back':
      return 'nav:back';
    case 'nav_reset':
      return 'nav:home';
    case 'admin_entry':
      return 'nav:admin';
    case 'guided_start':
      return 'flow:start';
    case 'guided_advance':
      return typeof action.value === 'string'
        ? `flow:pick:${action.value}`
        : `flow:addons:${action.value.join(',')}`;
    case 'guided_toggle':
      return `flow:toggle:${action.value}`;
    case 'guided_back':
      return 'flow:back';
    case 'guided_finalize':
      return 'flow:finalize';
    case 'cart_clear':
      return 'cart:clear';
    case 'flower_draft_start':
      return 'draft:start';
    case 'flower_draft_input':
      return `draft:input:${action.value}`;
    case 'flower_draft_back':
      return 'draft:back';
    case 'flower_draft_save':
      return 'draft:save';
    case 'flower_draft_cancel':
      return 'draft:cancel';
  }
}

/**
 * Parse callback data back into an action, or null when it is not ours.
 */
export function decodeAction(data: string): InboundAction | null {
  switch (data) {
    case 'nav:back':
      return { type: 'nav_back' };
    case 'nav:home':
      return { type: 'nav_reset' };
    case 'nav:admin':
      return { type: 'admin_entry' };
    case 'flow:start':
      return { type: 'guided_start' };
    case 'flow:back':
      return { type: 'guided_back' };
    case 'flow:finalize':
      return { type: 'guided_finalize' };
    case 'cart:clear':
      return { type: 'cart_clear' };
    case 'draft:start':
      return { type: 'flower_draft_start' };
    case 'draft:back':
      return { type: 'flower_draft_back' };
    case 'draft:save':
      return { type: 'flower_draft_save' };
    case 'draft:cancel':
      return { type: 'flower_draft_cancel' };
  }

  if (data.startsWith('go:')) {
    const target = data.slice('go:'.length);
    return isScreenKey(target) ? { type: 'enter_screen', target } : null;
  }
  if (data.startsWith('flow:pick:')) {
    const value = data.slice('flow:pick:'.length);
    return value ? { type: 'guided_advance', value } : null;
  }
  if (data.startsWith('flow:toggle:')) {
    const value = data.slice('flow:toggle:'.length);
    return value ? { type: 'guided_toggle', value } : null;
  }
  if (data.startsWith('draft:input:')) {
    const value = data.slice('draft:input:'.length);
    return value ? { type: 'flower_draft_input', value } : null;
  }
  if (data.startsWith('flow:addons:')) {
    const list = data.slice('flow:addons:'.length);
    return { type: 'guided_advance', value: list ? list.split(',') : [] };
  }
  return null;
}
