/** Accepts raw bytes as well as text, like a Node writable stream. */
export interface OutputStream {
	write(chunk: string | Uint8Array): unknown;
}

export interface CommandIO {
	stdout: OutputStream;
}

export interface InitOptions {
	dir?: string;
	themeFile?: string;
}

export interface EnvOptions {
	shell?: string;
	json?: boolean;
}

export interface WatchOptions {
	passthrough?: boolean;
}

export const processIO: CommandIO = {
	stdout: process.stdout,
};
