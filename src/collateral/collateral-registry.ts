import type { Address } from "../shared/identifiers.js";
import type { CollateralToken } from "./types.js";

/** Resolves collateral asset addresses to their token implementations. */
export class CollateralRegistry {
	private readonly tokens = new Map<Address, CollateralToken>();

	register(asset: Address, token: CollateralToken): this {
		this.tokens.set(asset, token);
		return this;
	}

	unregister(asset: Address): boolean {
		return this.tokens.delete(asset);
	}

	get(asset: Address): CollateralToken | null {
		return this.tokens.get(asset) ?? null;
	}

	has(asset: Address): boolean {
		return this.tokens.has(asset);
	}
}
