// SPDX-License-Identifier: MIT
// Fresh Name Generation
// One generator per compilation unit; names never repeat within it

//==============================================================================
// Fresh Name Generator
//==============================================================================

/**
 * Generates names that are distinct from every reserved name and from every
 * name this generator has produced before. Names look like "k$0", "v$1".
 * The counter is shared by every base, so it increases monotonically.
 */
export class FreshNames {
	private readonly taken: Set<string>;
	private counter = 0;

	constructor(reserved: Iterable<string> = []) {
		this.taken = new Set(reserved);
	}

	next(base: string): string {
		let candidate = base + "$" + String(this.counter++);
		while (this.taken.has(candidate)) {
			candidate = base + "$" + String(this.counter++);
		}
		this.taken.add(candidate);
		return candidate;
	}

	/** Number of names generated so far, including skipped candidates. */
	get count(): number {
		return this.counter;
	}
}
