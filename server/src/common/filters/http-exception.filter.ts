import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { LedgerError, LedgerErrorCode, StorageError } from "@pledgebook/sdk";

export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, HttpStatus> = {
	UNAUTHORIZED: HttpStatus.FORBIDDEN,
	NOT_FOUND: HttpStatus.NOT_FOUND,
	ALREADY_FINALIZED: HttpStatus.CONFLICT,
	PRECONDITION_FAILED: HttpStatus.UNPROCESSABLE_ENTITY,
	INVALID_LOCK: HttpStatus.CONFLICT,
	ROLLBACK_FAILED: HttpStatus.INTERNAL_SERVER_ERROR,
};

export type ErrorBody = {
	statusCode: number;
	message: string | string[];
	error: string;
	code?: string;
};

/**
 * Maps ledger errors onto HTTP statuses and renders every error as
 * `{ statusCode, message, error }`.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();
		const body = this.toBody(exception);
		if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
			this.logger.error(
				body.message,
				exception instanceof Error ? exception.stack : undefined,
			);
		}
		res.status(body.statusCode).json(body);
	}

	toBody(exception: unknown): ErrorBody {
		if (exception instanceof LedgerError) {
			const statusCode = LEDGER_ERROR_STATUS[exception.code];
			return {
				statusCode,
				message: exception.message,
				error: reasonPhrase(statusCode),
				code: exception.code,
			};
		}

		if (exception instanceof HttpException) {
			const statusCode = exception.getStatus();
			const response = exception.getResponse();
			const message =
				typeof response === "object" &&
				"message" in response &&
				(typeof response.message === "string" || Array.isArray(response.message))
					? response.message
					: exception.message;
			return { statusCode, message, error: reasonPhrase(statusCode) };
		}

		if (exception instanceof StorageError) {
			return {
				statusCode: HttpStatus.SERVICE_UNAVAILABLE,
				message: exception.message,
				error: reasonPhrase(HttpStatus.SERVICE_UNAVAILABLE),
				code: exception.code,
			};
		}

		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			message: "Internal server error",
			error: reasonPhrase(HttpStatus.INTERNAL_SERVER_ERROR),
		};
	}
}

function reasonPhrase(status: number): string {
	switch (status) {
		case HttpStatus.BAD_REQUEST:
			return "Bad Request";
		case HttpStatus.UNAUTHORIZED:
			return "Unauthorized";
		case HttpStatus.FORBIDDEN:
			return "Forbidden";
		case HttpStatus.NOT_FOUND:
			return "Not Found";
		case HttpStatus.CONFLICT:
			return "Conflict";
		case HttpStatus.UNPROCESSABLE_ENTITY:
			return "Unprocessable Entity";
		case HttpStatus.SERVICE_UNAVAILABLE:
			return "Service Unavailable";
		default:
			return status >= 500 ? "Internal Server Error" : "Error";
	}
}
