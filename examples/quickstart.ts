#!/usr/bin/env npx tsx
// ─── Staked Governance SDK — Quick-Start ───────────────────────────────────
// Full flow: mint → stake → create poll → vote → end poll → execute
//
// Usage:
//   npx tsx examples/quickstart.ts                         # uses localhost:8787
//   API_URL=https://your-server.com npx tsx examples/quickstart.ts
//
// Heights are simulated block heights; the server's default config uses a
// voting period of 10000 blocks and a timelock of 10000 blocks.
// ────────────────────────────────────────────────────────────────────────────

import { GovernanceAPIError, GovernanceClient } from '../src/sdk/index.js';

const API_URL = process.env.API_URL ?? 'http://localhost:8787';

async function main() {
  console.log(`\n🗳️  Staked Governance SDK — Quick-Start`);
  console.log(`   API: ${API_URL}\n`);

  const client = new GovernanceClient(API_URL);

  const health = await client.health();
  console.log(`✅ Health: ${health.status} | initialized=${health.initialized}`);

  const config = await client.getConfig();
  console.log(`   quorum=${config.quorum} threshold=${config.threshold} deposit=${config.proposalDeposit}`);

  // ── 1. Fund two stakers on the paper token ─────────────────────────────
  const deposit = BigInt(config.proposalDeposit);
  await client.mint('alice', 1_000n + deposit);
  await client.mint('bob', 400n);

  // ── 2. Stake ───────────────────────────────────────────────────────────
  const start = (await client.getState()).pollCount * 100_000 + 1;
  await client.stake('alice', 1_000n, start);
  await client.stake('bob', 400n, start);
  const alice = await client.getStaker('alice');
  console.log(`\n💰 alice: balance=${alice.balance} share=${alice.share}`);

  // ── 3. Create a poll ───────────────────────────────────────────────────
  const created = await client.createPoll('alice', deposit, start + 1, {
    title: 'Fund the registry',
    description: 'Register the community registry contract',
    executeMsgs: [{ order: 1, target: 'registry', payload: Buffer.from('{"register":{}}').toString('base64') }],
  });
  const pollId = Number(created.attributes.find((a) => a.key === 'poll_id')?.value);
  console.log(`\n📝 Poll #${pollId} created`);

  // ── 4. Vote ────────────────────────────────────────────────────────────
  await client.castVote('alice', start + 2, pollId, 'yes', 1_000n);
  await client.castVote('bob', start + 2, pollId, 'no', 400n);
  const voters = await client.listVoters(pollId);
  for (const v of voters) console.log(`   ${v.voter}: ${v.vote} ${v.balance}`);

  // ── 5. End and execute ─────────────────────────────────────────────────
  const poll = await client.getPoll(pollId);
  const ended = await client.execute('alice', poll.endHeight + 1, { type: 'end_poll', pollId });
  const passed = ended.attributes.find((a) => a.key === 'passed')?.value;
  console.log(`\n🏁 Poll ended: passed=${passed}`);

  if (passed === 'true') {
    await client.execute('alice', poll.endHeight + config.timelockPeriod + 1, { type: 'execute_poll', pollId });
    const calls = await client.listOutbox(5);
    console.log(`🚀 Executed; outbox holds ${calls.length} call(s)`);
  }

  // ── 6. Withdraw everything ─────────────────────────────────────────────
  await client.withdraw('bob', poll.endHeight + 2);
  console.log(`\n👋 bob withdrew: ${(await client.balanceOf('bob')).balance}`);
}

main().catch((error) => {
  if (error instanceof GovernanceAPIError) {
    console.error(`❌ ${error.code} (${error.status}): ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
