/**
 * Resolve and Redeem: a binary question from split to payout.
 *
 * Alice splits 100 units of collateral, sells the NO side to Bob, and the
 * oracle reports a 1:3 payout. Each holder then redeems their share.
 *
 * Run: npx tsx examples/resolve-and-redeem.ts
 */

import {
	CollateralRegistry,
	ConditionalLedger,
	MAX_UINT256,
	MemoryCollateralToken,
	ROOT_SLOT,
	address,
	encodePayoutReport,
	questionIdFromLabel,
	unwrap,
} from "../src/index.js";

const alice = address("0x1111111111111111111111111111111111111111");
const bob = address("0x2222222222222222222222222222222222222222");
const oracle = address("0x9999999999999999999999999999999999999999");
const usd = address("0x5555555555555555555555555555555555555555");
const custody = address("0x7777777777777777777777777777777777777777");

const token = new MemoryCollateralToken();
token.mint(alice, 100n);
token.approve(alice, custody, MAX_UINT256);

const ledger = ConditionalLedger.create({
	config: { custodyAddress: custody, logLevel: "warn" },
	collateral: new CollateralRegistry().register(usd, token),
});
ledger.onAny((event) => {
	console.log(`#${event.sequence} ${event.type}`);
});

const question = questionIdFromLabel("will-it-rain");
const cid = unwrap(ledger.conditions.prepareCondition(oracle, question, 2n));
unwrap(ledger.positions.splitPosition(alice, usd, ROOT_SLOT, cid, 100n));

const [yes, no] = unwrap(ledger.positions.childPositionIds(usd, ROOT_SLOT, cid));
if (yes === undefined || no === undefined) throw new Error("binary condition has two positions");
unwrap(ledger.assets.safeTransfer(alice, alice, bob, no, 100n));
console.log(`Alice YES: ${ledger.assets.balanceOf(alice, yes)}, Bob NO: ${ledger.assets.balanceOf(bob, no)}`);

unwrap(ledger.oracle.receiveResult(oracle, question, unwrap(encodePayoutReport([1n, 3n]))));

console.log(`Alice redeems ${unwrap(ledger.positions.redeemPayout(alice, usd, ROOT_SLOT, cid))}`);
console.log(`Bob redeems ${unwrap(ledger.positions.redeemPayout(bob, usd, ROOT_SLOT, cid))}`);
console.log(`Custody left: ${token.balanceOf(custody)}`);
