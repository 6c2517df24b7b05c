/**
 * Centralized Redaction Configuration
 * Defines record keys that must be redacted from logs to prevent leaking party data.
 */
export const REDACT_KEYS = [
    // Parties (Root and Nested)
    'debtorName', '*.debtorName',
    'creditorName', '*.creditorName',
    'initiatingParty', '*.initiatingParty',
    'accountOwner', '*.accountOwner',
    'organizationName', '*.organizationName',

    // Accounts (Root and Nested)
    'debtorAccount', '*.debtorAccount',
    'creditorAccount', '*.creditorAccount',
    'accountId', '*.accountId',
    'iban', '*.iban',

    // Addresses (Root and Nested)
    'debtorAddress', '*.debtorAddress',
    'creditorAddress', '*.creditorAddress',

    // Free text
    'remittanceInfo', '*.remittanceInfo'
];

export const REDACT_CENSOR = '[REDACTED]';
