import { Mutex } from "./locks.js";

describe("Mutex", () => {
	it("runs callers one at a time in arrival order", async () => {
		const mutex = new Mutex();
		const trace: string[] = [];

		const task = (name: string, delayMs: number) =>
			mutex.runExclusive(async () => {
				trace.push(`${name}:start`);
				await new Promise((resolve) => setTimeout(resolve, delayMs));
				trace.push(`${name}:end`);
				return name;
			});

		const results = await Promise.all([task("a", 20), task("b", 0), task("c", 5)]);

		expect(results).toEqual(["a", "b", "c"]);
		expect(trace).toEqual([
			"a:start",
			"a:end",
			"b:start",
			"b:end",
			"c:start",
			"c:end",
		]);
	});

	it("releases the lock when the callback throws", async () => {
		const mutex = new Mutex();

		await expect(
			mutex.runExclusive(async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		expect(mutex.isLocked()).toBe(false);
		await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
	});

	it("reports whether it is held", async () => {
		const mutex = new Mutex();
		let heldInside = false;
		await mutex.runExclusive(() => {
			heldInside = mutex.isLocked();
		});
		expect(heldInside).toBe(true);
		expect(mutex.isLocked()).toBe(false);
	});
});
