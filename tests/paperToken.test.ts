import { describe, expect, it } from 'vitest';
import { PaperToken } from '../src/integrations/token/paperToken.js';

describe('PaperToken', () => {
  it('settles transfers and records delegated calls on dispatch', async () => {
    const token = new PaperToken('voting_token');
    token.mint('gov_contract', 50n);

    await token.dispatch('gov_contract', [
      { kind: 'token_transfer', token: 'voting_token', recipient: 'carol', amount: 20n },
      { kind: 'delegated_call', target: 'registry', payload: 'AQ==' },
    ]);

    expect(await token.balanceOf('voting_token', 'gov_contract')).toBe(30n);
    expect(token.balance('carol')).toBe(20n);
    expect(token.listOutbox()).toEqual([
      { sender: 'gov_contract', target: 'registry', payload: 'AQ==', dispatchedAt: expect.any(String) },
    ]);
  });

  it('refuses overdrafts', () => {
    const token = new PaperToken('voting_token');
    token.mint('alice', 5n);
    expect(() => token.transfer('alice', 'bob', 6n)).toThrow('Insufficient token balance: alice holds 5, needs 6');
    expect(token.balance('alice')).toBe(5n);
  });

  it('rejects queries and transfers for another token', async () => {
    const token = new PaperToken('voting_token');
    await expect(token.balanceOf('other', 'alice')).rejects.toThrow('Unknown token contract: other');
    await expect(token.dispatch('gov_contract', [
      { kind: 'token_transfer', token: 'other', recipient: 'carol', amount: 1n },
    ])).rejects.toThrow('Unknown token contract: other');
  });

  it('returns the most recent outbox entries', async () => {
    const token = new PaperToken('voting_token');
    await token.dispatch('gov_contract', ['a', 'b', 'c'].map((target) => ({
      kind: 'delegated_call' as const,
      target,
      payload: '',
    })));
    expect(token.listOutbox(2).map((call) => call.target)).toEqual(['b', 'c']);
  });
});
