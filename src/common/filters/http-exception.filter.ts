import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";

export interface ErrorResponseBody {
  success: false;
  error: {
    code: string;
    message: string;
    timestamp: number;
  };
  timestamp: number;
}

/**
 * Global exception filter that renders every controller failure in one envelope
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const { code, message } = this.describe(exception, status);
    const now = Date.now();

    const body: ErrorResponseBody = {
      success: false,
      error: { code, message, timestamp: now },
      timestamp: now,
    };

    this.logError(exception, request, status, message);

    response.status(status).json(body);
  }

  private describe(exception: unknown, status: number): { code: string; message: string } {
    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === "string") {
        return { code: this.codeForStatus(status), message: exceptionResponse };
      }

      if (typeof exceptionResponse === "object" && exceptionResponse !== null) {
        const code = "code" in exceptionResponse ? exceptionResponse.code : undefined;
        const message = "message" in exceptionResponse ? exceptionResponse.message : undefined;
        return {
          code: typeof code === "string" ? code : this.codeForStatus(status),
          message: Array.isArray(message)
            ? message.map(String).join("; ")
            : typeof message === "string"
              ? message
              : exception.message,
        };
      }

      return { code: this.codeForStatus(status), message: exception.message };
    }

    if (exception instanceof Error) {
      return { code: "INTERNAL_ERROR", message: exception.message };
    }

    return { code: "INTERNAL_ERROR", message: typeof exception === "string" ? exception : "Unknown error occurred" };
  }

  private codeForStatus(status: number): string {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return "BAD_REQUEST";
      case HttpStatus.NOT_FOUND:
        return "NOT_FOUND";
      case HttpStatus.SERVICE_UNAVAILABLE:
        return "SERVICE_UNAVAILABLE";
      default:
        return status >= 500 ? "INTERNAL_ERROR" : "HTTP_EXCEPTION";
    }
  }

  private logError(exception: unknown, request: Request, status: number, message: string): void {
    const line = `${request.method} ${request.path} - ${status} - ${message}`;

    if (status >= 500) {
      this.logger.error(line, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(line);
    }
  }
}
