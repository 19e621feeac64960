export const OPERATION_CLASSES = ["active-check", "check-all", "check-selected", "switch"] as const;

export type OperationClass = (typeof OPERATION_CLASSES)[number];

/**
 * Classes that must not overlap with the key. A switch rewrites the pool the
 * same way a reserve check does, so the two exclude each other.
 */
const CONFLICTS: Record<OperationClass, readonly OperationClass[]> = {
	"active-check": [],
	"check-all": ["switch"],
	"check-selected": ["switch"],
	switch: ["check-all", "check-selected"],
};

export type GateOutcome<T> =
	| { type: "ran"; value: T }
	| { type: "skipped"; reason: "in-flight" | "conflict"; blockedBy: OperationClass };

/**
 * One idle/running token per operation class. A request for a class that is
 * already running, or that conflicts with one that is, is dropped rather than
 * queued.
 */
export class OperationGate {
	private readonly running = new Set<OperationClass>();
	private readonly tasks = new Map<OperationClass, Promise<unknown>>();

	isRunning(operation: OperationClass): boolean {
		return this.running.has(operation);
	}

	/**
	 * Returns the class blocking `operation`, or null when it may start.
	 */
	blockerOf(operation: OperationClass): OperationClass | null {
		if (this.running.has(operation)) return operation;
		return CONFLICTS[operation].find((other) => this.running.has(other)) ?? null;
	}

	tryAcquire(operation: OperationClass): boolean {
		if (this.blockerOf(operation) !== null) return false;
		this.running.add(operation);
		return true;
	}

	release(operation: OperationClass): void {
		this.running.delete(operation);
	}

	async run<T>(operation: OperationClass, task: () => Promise<T>): Promise<GateOutcome<T>> {
		const blocker = this.blockerOf(operation);
		if (blocker !== null) {
			return { type: "skipped", reason: blocker === operation ? "in-flight" : "conflict", blockedBy: blocker };
		}

		this.running.add(operation);
		try {
			const pending = task();
			this.tasks.set(operation, pending);
			return { type: "ran", value: await pending };
		} finally {
			this.tasks.delete(operation);
			this.running.delete(operation);
		}
	}

	/**
	 * Resolves once no task started through {@link run} is still running.
	 * Failures are left to the caller that started the task.
	 */
	async drain(): Promise<void> {
		while (this.tasks.size > 0) {
			await Promise.allSettled([...this.tasks.values()]);
		}
	}

	snapshot(): OperationClass[] {
		return [...this.running];
	}
}
