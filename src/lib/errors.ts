/**
 * Error taxonomy for the client core.
 *
 * Every failure that crosses a public boundary is one of these classes, so the
 * interface layer can switch on `code` without parsing messages.
 */

export type PasteVaultErrorCode =
	| 'INVALID_INPUT'
	| 'AUTH_FAILURE'
	| 'NOT_AUTHENTICATED'
	| 'TRANSPORT_FAILURE'
	| 'CORRUPTED_LOCAL_STATE';

export class PasteVaultError extends Error {
	readonly code: PasteVaultErrorCode;

	constructor(code: PasteVaultErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** A required field was empty or malformed. */
export class InvalidInputError extends PasteVaultError {
	constructor(message: string, options?: ErrorOptions) {
		super('INVALID_INPUT', message, options);
	}
}

export class NoDataToEncryptError extends InvalidInputError {
	constructor() {
		super('no data to encrypt');
	}
}

/**
 * AEAD verification failed, or the server refused the credentials.
 * Wrong password, unknown email and tampered ciphertext all look the same from outside.
 */
export class AuthFailureError extends PasteVaultError {
	constructor(message = 'invalid credentials', options?: ErrorOptions) {
		super('AUTH_FAILURE', message, options);
	}
}

export class NotAuthenticatedError extends PasteVaultError {
	constructor(message = 'not logged in', options?: ErrorOptions) {
		super('NOT_AUTHENTICATED', message, options);
	}
}

/** Server unreachable (status 0) or answered with a non-success status. */
export class TransportFailureError extends PasteVaultError {
	readonly status: number;

	constructor(message: string, status: number, options?: ErrorOptions) {
		super('TRANSPORT_FAILURE', message, options);
		this.status = status;
	}

	/** The server understood the request and refused it. */
	get isRejection(): boolean {
		return this.status >= 400 && this.status < 500;
	}
}

export class CorruptedLocalStateError extends PasteVaultError {
	readonly path: string;

	constructor(path: string, message: string, options?: ErrorOptions) {
		super('CORRUPTED_LOCAL_STATE', `${message}: ${path}`, options);
		this.path = path;
	}
}
