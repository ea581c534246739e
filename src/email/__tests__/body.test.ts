// ============================================================================
// Tests: Notification Subject and Body
// ============================================================================

import { describe, test, expect } from 'vitest';
import { formatBody, formatSubject } from '../body.js';

describe('formatSubject', () => {
  test('wraps the approval name in brackets before the title', () => {
    expect(formatSubject('付款test', 'Taxi')).toBe('[付款test]-Taxi');
  });

  test('keeps an empty title', () => {
    expect(formatSubject('费用报销', '')).toBe('[费用报销]-');
  });
});

describe('formatBody', () => {
  test('lists type, title, amount and attachment count', () => {
    expect(
      formatBody({ approvalName: '费用报销', title: 'Hotel', amount: '50 SEK, 10 EUR', attachmentCount: 3 }),
    ).toBe('审批已通过\n\n审批类型: 费用报销\n审批标题: Hotel\n审批金额: 50 SEK, 10 EUR\n附件数量: 3\n');
  });

  test('leaves the amount line empty when there is no amount', () => {
    const body = formatBody({ approvalName: '付款test', title: 'Taxi', amount: '', attachmentCount: 1 });
    expect(body.split('\n')[4]).toBe('审批金额: ');
  });
});
