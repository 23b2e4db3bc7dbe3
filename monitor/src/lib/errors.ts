export type ErrorCode =
	| "CONFIG_ERROR"
	| "TRANSPORT_ERROR"
	| "IDENTIFICATION_ERROR"
	| "SHORT_READ"
	| "PERSISTENCE_ERROR"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
	return err instanceof AppError && (code === undefined || err.code === code);
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

export function transportError(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "TRANSPORT_ERROR",
		message: cause === undefined ? message : `${message}: ${errorMessage(cause)}`,
		cause
	});
}

export function identificationError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "IDENTIFICATION_ERROR",
		message,
		details
	});
}

export function shortReadError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "SHORT_READ",
		message,
		details
	});
}

export function persistenceError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "PERSISTENCE_ERROR",
		message,
		details,
		cause
	});
}
