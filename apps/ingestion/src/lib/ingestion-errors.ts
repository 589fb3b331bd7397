export type IngestionErrorKind =
    | 'auth_bootstrap_required'
    | 'auth_expired_unrecoverable'
    | 'credential_persist_failed'
    | 'transient_network'
    | 'rate_limited'
    | 'storage_write_failed'
    | 'provider_request_rejected'
    | 'provider_response_invalid'
    | 'cursor_unsupported'
    | 'config_invalid';

export abstract class IngestionError extends Error {
    abstract readonly kind: IngestionErrorKind;
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// No stored credentials and nothing to bootstrap from
export class AuthBootstrapRequiredError extends IngestionError {
    readonly kind = 'auth_bootstrap_required';
    readonly retryable = false;

    constructor(message = 'No stored credentials; run the authorization flow') {
        super(message);
    }
}

// Refresh token rejected by the accounts service; needs operator re-authorization
export class AuthExpiredUnrecoverableError extends IngestionError {
    readonly kind = 'auth_expired_unrecoverable';
    readonly retryable = false;
}

// A refreshed token could not be persisted and would be lost on teardown.
// The stored pair is untouched, so the next run can refresh again.
export class CredentialPersistError extends IngestionError {
    readonly kind = 'credential_persist_failed';
    readonly retryable = true;
}

export class TransientNetworkError extends IngestionError {
    readonly kind = 'transient_network';
    readonly retryable = true;
}

export class RateLimitedError extends IngestionError {
    readonly kind = 'rate_limited';
    readonly retryable = true;

    constructor(
        public readonly retryAfterMs: number,
        message = `Rate limited; try again in ${Math.ceil(retryAfterMs / 1000)}s`
    ) {
        super(message);
    }
}

export class StorageWriteFailedError extends IngestionError {
    readonly kind = 'storage_write_failed';
    readonly retryable = true;
}

// 404 or another 4xx: the same request will be refused again
export class ProviderRequestRejectedError extends IngestionError {
    readonly kind = 'provider_request_rejected';
    readonly retryable = false;

    constructor(
        public readonly statusCode: number,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

// 200 whose body is not a recently-played envelope
export class ProviderResponseInvalidError extends IngestionError {
    readonly kind = 'provider_response_invalid';
    readonly retryable = false;
}

// Stored watermark holds a token the provider cannot page from
export class UnsupportedCursorError extends IngestionError {
    readonly kind = 'cursor_unsupported';
    readonly retryable = false;

    constructor(public readonly token: string) {
        super(`Unsupported cursor token: ${token}`);
    }
}

export class ConfigError extends IngestionError {
    readonly kind = 'config_invalid';
    readonly retryable = false;

    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
    }
}

export function isAuthError(error: unknown): boolean {
    return (
        error instanceof AuthBootstrapRequiredError ||
        error instanceof AuthExpiredUnrecoverableError
    );
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
