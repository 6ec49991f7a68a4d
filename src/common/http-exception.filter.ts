import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { I18nService, type MessageVars } from '../i18n/i18n.service';

interface KeyedMessage {
    key: string;
    vars?: MessageVars;
}

function isKeyedMessage(value: unknown): value is KeyedMessage {
    return typeof value === 'object' && value !== null && 'key' in value && typeof value.key === 'string';
}

function readVars(body: object): MessageVars | undefined {
    if (!('vars' in body) || typeof body.vars !== 'object' || body.vars === null) return undefined;
    const vars: MessageVars = {};
    for (const [name, value] of Object.entries(body.vars)) {
        if (typeof value === 'string' || typeof value === 'number') vars[name] = value;
    }
    return vars;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(HttpExceptionFilter.name);

    constructor(private readonly i18n: I18nService) { }

    catch(exception: unknown, host: ArgumentsHost) {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<Response>();
        const request = ctx.getRequest<Request>();

        let status = HttpStatus.INTERNAL_SERVER_ERROR;
        let message: string | string[] | KeyedMessage = 'Internal server error';

        if (exception instanceof HttpException) {
            status = exception.getStatus();
            const res = exception.getResponse();

            if (typeof res === 'string') {
                message = res;
            } else if (isKeyedMessage(res)) {
                // Structured body: { key: 'translation.key', vars: {...} }
                message = { key: res.key, vars: readVars(res) };
            } else if ('message' in res && (typeof res.message === 'string' || Array.isArray(res.message))) {
                // ValidationPipe and plain Nest exceptions
                message = res.message;
            }
        } else if (exception instanceof Error) {
            this.logger.error(exception.message, exception.stack);
            message = exception.message;
        }

        const locale = this.resolveLocale(request.headers['accept-language']);

        let translated: string | string[];
        if (isKeyedMessage(message)) {
            translated = this.i18n.t(message.key, locale, message.vars);
        } else if (typeof message === 'string' && !message.includes(' ')) {
            translated = this.i18n.t(message, locale);
        } else {
            translated = message;
        }

        response.status(status).json({
            success: false,
            error: {
                statusCode: status,
                message: translated,
            },
        });
    }

    private resolveLocale(header: string | string[] | undefined): string {
        const accept = (Array.isArray(header) ? header[0] : header) || 'en';
        return accept.split(',')[0].split('-')[0].trim() || 'en';
    }
}
