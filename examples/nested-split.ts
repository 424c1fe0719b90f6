/**
 * Nested Split: positions conditioned on two questions at once.
 *
 * Splitting on Q1 then Q2 lands on the same position ids as splitting on
 * Q2 then Q1, because slot ids combine by modular addition.
 *
 * Run: npx tsx examples/nested-split.ts
 */

import {
	ROOT_SLOT,
	TestLedgerBuilder,
	address,
	getPayoutSlotId,
	getPositionId,
	questionIdFromLabel,
	unwrap,
} from "../src/index.js";

const alice = address("0x1111111111111111111111111111111111111111");
const oracle = address("0x9999999999999999999999999999999999999999");

const { ledger, collateralAsset: usd } = new TestLedgerBuilder().withFunds(alice, 1_000n).build();
const { conditions, positions, assets } = ledger;

const election = unwrap(conditions.prepareCondition(oracle, questionIdFromLabel("election"), 2n));
const policy = unwrap(conditions.prepareCondition(oracle, questionIdFromLabel("policy"), 3n));

// Path A: election first, then policy under election outcome 0
unwrap(positions.splitPosition(alice, usd, ROOT_SLOT, election, 100n));
const electionWins = getPayoutSlotId(ROOT_SLOT, election, 0n);
unwrap(positions.splitPosition(alice, usd, electionWins, policy, 100n));

// Path B: policy first, then election under policy outcome 1
unwrap(positions.splitPosition(alice, usd, ROOT_SLOT, policy, 100n));
const policyOne = getPayoutSlotId(ROOT_SLOT, policy, 1n);
unwrap(positions.splitPosition(alice, usd, policyOne, election, 100n));

const viaElection = getPositionId(usd, getPayoutSlotId(electionWins, policy, 1n));
const viaPolicy = getPositionId(usd, getPayoutSlotId(policyOne, election, 0n));

console.log(`Same position either way: ${viaElection === viaPolicy}`);
console.log(`Alice holds ${assets.balanceOf(alice, viaElection)} of (election=0, policy=1)`);
