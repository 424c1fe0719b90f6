/**
 * FileJournal -- JSONL-based persistent journal for ledger events.
 *
 * Appends one encoded event per line. restore() reads them back, reporting
 * lines that are not JSON and lines that are JSON but not a valid event
 * instead of silently dropping either.
 */

import { appendFile, readFile, rename, stat } from "node:fs/promises";
import { decodeEvent, encodeEvent } from "../events/event-codec.js";
import type { LedgerEvent } from "../events/ledger-events.js";
import type { ValidationIssue } from "../lib/validation/index.js";
import { SystemError } from "../shared/errors.js";
import type { Journal } from "./journal.js";

/** Configuration for creating a FileJournal instance. */
export interface FileJournalConfig {
	readonly filePath: string;
	readonly maxFileSizeBytes?: number | undefined;
	readonly maxFiles?: number | undefined;
}

/** A line in the JSONL file that could not be parsed as JSON. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
}

/** A line that parsed as JSON but failed event validation. */
export interface InvalidLine extends CorruptLine {
	readonly issues: readonly ValidationIssue[];
}

/** Result of restoring events from a JSONL file. */
export interface RestoreResult {
	readonly events: readonly LedgerEvent[];
	readonly corruptLines: readonly CorruptLine[];
	readonly invalidLines: readonly InvalidLine[];
}

const MAX_RAW_LENGTH = 200;
const MAX_KEPT_ERRORS = 10;
const DEFAULT_MAX_FILES = 5;

const EMPTY_RESTORE: RestoreResult = { events: [], corruptLines: [], invalidLines: [] };

export class FileJournal implements Journal {
	private readonly config: FileJournalConfig;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly _writeErrors: SystemError[] = [];

	private constructor(config: FileJournalConfig) {
		this.config = config;
	}

	private get filePath(): string {
		return this.config.filePath;
	}

	private get maxFileSizeBytes(): number | undefined {
		return this.config.maxFileSizeBytes;
	}

	private get maxFiles(): number {
		if (this.config.maxFiles !== undefined) {
			return this.config.maxFiles;
		}
		return this.config.maxFileSizeBytes !== undefined ? DEFAULT_MAX_FILES : 0;
	}

	/**
	 * Creates a new FileJournal writing to the specified file path.
	 * Rotation is off unless `maxFileSizeBytes` is set.
	 */
	static create(config: FileJournalConfig): FileJournal {
		return new FileJournal(config);
	}

	async record(event: LedgerEvent): Promise<void> {
		if (this.closed) {
			throw new SystemError("FileJournal is closed", { filePath: this.filePath });
		}
		const line = `${encodeEvent(event)}\n`;
		// A failed write has already been reported to its own caller.
		this.writeQueue = this.settled().then(() => this.writeOnce(line));
		await this.writeQueue;
	}

	/**
	 * Reads and decodes every event in the JSONL file.
	 * A missing file restores as empty; other filesystem errors propagate.
	 */
	async restore(): Promise<RestoreResult> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === "ENOENT") {
				return EMPTY_RESTORE;
			}
			throw error;
		}

		const events: LedgerEvent[] = [];
		const corruptLines: CorruptLine[] = [];
		const invalidLines: InvalidLine[] = [];

		for (const [i, line] of content.split("\n").entries()) {
			const trimmed = line.trim();
			if (trimmed.length === 0) continue;
			const raw = trimmed.slice(0, MAX_RAW_LENGTH);

			let parsed: unknown;
			try {
				parsed = JSON.parse(trimmed);
			} catch {
				corruptLines.push({ lineNumber: i + 1, raw });
				continue;
			}

			const decoded = decodeEvent(parsed);
			if (decoded.ok) {
				events.push(decoded.value);
			} else {
				invalidLines.push({ lineNumber: i + 1, raw, issues: decoded.error.issues });
			}
		}

		return { events, corruptLines, invalidLines };
	}

	/** Marks the journal as closed, draining any pending writes first. */
	async close(): Promise<void> {
		this.closed = true;
		await this.settled();
	}

	/** Waits for all pending writes to complete. */
	async flush(): Promise<void> {
		await this.settled();
	}

	/** The most recent write errors, oldest first. */
	writeErrors(): readonly SystemError[] {
		return this._writeErrors;
	}

	private settled(): Promise<void> {
		return this.writeQueue.then(
			() => undefined,
			() => undefined,
		);
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			if (this.maxFileSizeBytes !== undefined && this.maxFileSizeBytes > 0) {
				await this.rotateIfNeeded(this.maxFileSizeBytes);
			}
			await appendFile(this.filePath, line, "utf-8");
		} catch (error: unknown) {
			const code = isNodeError(error) ? error.code : "UNKNOWN";
			const msg = error instanceof Error ? error.message : String(error);
			const wrapped = new SystemError(
				`FileJournal write to ${this.filePath} failed: [${code}] ${msg}`,
				{ filePath: this.filePath, cause: error },
			);
			this._writeErrors.push(wrapped);
			if (this._writeErrors.length > MAX_KEPT_ERRORS) {
				this._writeErrors.shift();
			}
			throw wrapped;
		}
	}

	private async rotateIfNeeded(maxSize: number): Promise<void> {
		try {
			const stats = await stat(this.filePath);
			if (stats.size < maxSize) {
				return;
			}
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === "ENOENT") {
				return;
			}
			throw error;
		}

		await this.rotate();
	}

	// journal.jsonl -> journal.jsonl.1 -> ... -> journal.jsonl.<maxFiles>
	private async rotate(): Promise<void> {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
		}
		await renameIfExists(this.filePath, `${this.filePath}.1`);
	}
}

async function renameIfExists(from: string, to: string): Promise<void> {
	try {
		await rename(from, to);
	} catch (error: unknown) {
		if (!isNodeError(error) || error.code !== "ENOENT") {
			throw error;
		}
	}
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}
