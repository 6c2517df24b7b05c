import { z } from 'zod';

/**
 * Unified record model shared by the parser, translator, validator,
 * reconciler and builder.
 *
 * Every record is a plain object tagged by `kind`: `'payment'` for the base
 * record, the ISO 20022 family key for the specialised ones. Amounts are kept
 * as the decimal strings found on the wire, never as numbers.
 */

const text = () => z.string().optional();

export const PostalAddressSchema = z.object({
    country: text(),
    townName: text(),
    postCode: text(),
    streetName: text(),
    buildingNumber: text(),
    addressLines: z.array(z.string()).default([]),
});

/** Untyped map used below message level (transactions, entries, balances...) */
export const LooseEntrySchema = z.record(z.string().nullable());

const entryList = () => z.array(LooseEntrySchema).default([]);

export const PAYMENT_FIELDS = {
    messageId: text(),
    endToEndId: text(),
    uetr: text(),
    amount: text(),
    currency: text(),
    senderBic: text(),
    receiverBic: text(),
    debtorName: text(),
    creditorName: text(),
    debtorAddress: PostalAddressSchema.optional(),
    creditorAddress: PostalAddressSchema.optional(),
    debtorAccount: text(),
    creditorAccount: text(),
};

const ACCOUNT_FIELDS = {
    accountId: text(),
    accountCurrency: text(),
    accountOwner: text(),
    accountServicer: text(),
};

const ENTRY_TOTALS = {
    totalCreditEntries: text(),
    totalCreditAmount: text(),
    totalDebitEntries: text(),
    totalDebitAmount: text(),
};

const INITIATION_FIELDS = {
    creationDateTime: text(),
    numberOfTransactions: z.number().int().optional(),
    controlSum: text(),
    initiatingParty: text(),
    paymentInformation: entryList(),
};

const ACCOUNT_MAINTENANCE_FIELDS = {
    creationDateTime: text(),
    processId: text(),
    accountId: text(),
    accountCurrency: text(),
    organizationName: text(),
    branchName: text(),
};

const INVESTMENT_ORDER_FIELDS = {
    creationDateTime: text(),
    masterReference: text(),
    poolReference: text(),
    orders: entryList(),
};

export const PaymentMessageSchema = z.object({
    kind: z.literal('payment'),
    ...PAYMENT_FIELDS,
});

export const Pacs008MessageSchema = z.object({
    kind: z.literal('pacs.008'),
    ...PAYMENT_FIELDS,
    settlementMethod: text(),
    clearingSystem: text(),
    numberOfTransactions: z.number().int().optional(),
    settlementAmount: text(),
    settlementCurrency: text(),
    transactions: entryList(),
});

export const Pacs004MessageSchema = z.object({
    kind: z.literal('pacs.004'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    originalMessageId: text(),
    originalMessageNameId: text(),
    transactions: entryList(),
});

export const Pacs009MessageSchema = z.object({
    kind: z.literal('pacs.009'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    settlementMethod: text(),
    transactions: entryList(),
});

export const Pain001MessageSchema = z.object({
    kind: z.literal('pain.001'),
    ...PAYMENT_FIELDS,
    ...INITIATION_FIELDS,
});

export const Pain002MessageSchema = z.object({
    kind: z.literal('pain.002'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    initiatingParty: text(),
    originalMessageId: text(),
    originalMessageNameId: text(),
    groupStatus: text(),
    transactionsStatus: entryList(),
});

export const Pain008MessageSchema = z.object({
    kind: z.literal('pain.008'),
    ...PAYMENT_FIELDS,
    ...INITIATION_FIELDS,
});

export const Camt004MessageSchema = z.object({
    kind: z.literal('camt.004'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    originalBusinessQuery: text(),
    accountId: text(),
    accountOwner: text(),
    accountServicer: text(),
    accountStatus: text(),
    accountCurrency: text(),
    balances: entryList(),
    limits: entryList(),
    numberOfPayments: text(),
    businessErrors: entryList(),
});

export const Camt029MessageSchema = z.object({
    kind: z.literal('camt.029'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    assignmentId: text(),
    caseId: text(),
    investigationStatus: text(),
    cancellationDetails: entryList(),
});

export const Camt052MessageSchema = z.object({
    kind: z.literal('camt.052'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    reportId: text(),
    ...ACCOUNT_FIELDS,
    ...ENTRY_TOTALS,
    entries: entryList(),
});

export const Camt053MessageSchema = z.object({
    kind: z.literal('camt.053'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    statementId: text(),
    ...ACCOUNT_FIELDS,
    balances: entryList(),
    ...ENTRY_TOTALS,
    entries: entryList(),
});

export const Camt054MessageSchema = z.object({
    kind: z.literal('camt.054'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    notificationId: text(),
    ...ACCOUNT_FIELDS,
    ...ENTRY_TOTALS,
    entries: entryList(),
});

export const Camt056MessageSchema = z.object({
    kind: z.literal('camt.056'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    assignmentId: text(),
    caseId: text(),
    originalMessageId: text(),
    originalMessageNameId: text(),
    recallReason: text(),
    underlyingTransactions: entryList(),
});

export const Camt086MessageSchema = z.object({
    kind: z.literal('camt.086'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    reportId: text(),
    groupId: text(),
    statementId: text(),
    statementStatus: text(),
});

export const Fxtr014MessageSchema = z.object({
    kind: z.literal('fxtr.014'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    tradeDate: text(),
    settlementDate: text(),
    exchangeRate: text(),
    tradingParty: text(),
    counterparty: text(),
    tradedCurrency: text(),
    tradedAmount: text(),
});

export const Sese023MessageSchema = z.object({
    kind: z.literal('sese.023'),
    ...PAYMENT_FIELDS,
    creationDateTime: text(),
    tradeDate: text(),
    settlementDate: text(),
    securityId: text(),
    securityIdType: text(),
    securityQuantity: text(),
    securityQuantityType: text(),
    settlementAmount: text(),
    settlementCurrency: text(),
    deliveringAgent: text(),
    receivingAgent: text(),
});

export const Acmt007MessageSchema = z.object({
    kind: z.literal('acmt.007'),
    ...PAYMENT_FIELDS,
    ...ACCOUNT_MAINTENANCE_FIELDS,
});

export const Acmt015MessageSchema = z.object({
    kind: z.literal('acmt.015'),
    ...PAYMENT_FIELDS,
    ...ACCOUNT_MAINTENANCE_FIELDS,
});

export const Setr004MessageSchema = z.object({
    kind: z.literal('setr.004'),
    ...PAYMENT_FIELDS,
    ...INVESTMENT_ORDER_FIELDS,
});

export const Setr010MessageSchema = z.object({
    kind: z.literal('setr.010'),
    ...PAYMENT_FIELDS,
    ...INVESTMENT_ORDER_FIELDS,
});

export const TypedRecordSchema = z.discriminatedUnion('kind', [
    PaymentMessageSchema,
    Pacs008MessageSchema,
    Pacs004MessageSchema,
    Pacs009MessageSchema,
    Pain001MessageSchema,
    Pain002MessageSchema,
    Pain008MessageSchema,
    Camt004MessageSchema,
    Camt029MessageSchema,
    Camt052MessageSchema,
    Camt053MessageSchema,
    Camt054MessageSchema,
    Camt056MessageSchema,
    Camt086MessageSchema,
    Fxtr014MessageSchema,
    Sese023MessageSchema,
    Acmt007MessageSchema,
    Acmt015MessageSchema,
    Setr004MessageSchema,
    Setr010MessageSchema,
]);

/** Schema of every record variant, keyed by its `kind` */
export const RECORD_SCHEMAS = {
    'payment': PaymentMessageSchema,
    'pacs.008': Pacs008MessageSchema,
    'pacs.004': Pacs004MessageSchema,
    'pacs.009': Pacs009MessageSchema,
    'pain.001': Pain001MessageSchema,
    'pain.002': Pain002MessageSchema,
    'pain.008': Pain008MessageSchema,
    'camt.004': Camt004MessageSchema,
    'camt.029': Camt029MessageSchema,
    'camt.052': Camt052MessageSchema,
    'camt.053': Camt053MessageSchema,
    'camt.054': Camt054MessageSchema,
    'camt.056': Camt056MessageSchema,
    'camt.086': Camt086MessageSchema,
    'fxtr.014': Fxtr014MessageSchema,
    'sese.023': Sese023MessageSchema,
    'acmt.007': Acmt007MessageSchema,
    'acmt.015': Acmt015MessageSchema,
    'setr.004': Setr004MessageSchema,
    'setr.010': Setr010MessageSchema,
} as const;

export type PostalAddress = z.infer<typeof PostalAddressSchema>;
export type LooseEntry = z.infer<typeof LooseEntrySchema>;
export type PaymentMessage = z.infer<typeof PaymentMessageSchema>;
export type Pacs008Message = z.infer<typeof Pacs008MessageSchema>;
export type Pacs004Message = z.infer<typeof Pacs004MessageSchema>;
export type Pacs009Message = z.infer<typeof Pacs009MessageSchema>;
export type Pain001Message = z.infer<typeof Pain001MessageSchema>;
export type Pain002Message = z.infer<typeof Pain002MessageSchema>;
export type Pain008Message = z.infer<typeof Pain008MessageSchema>;
export type Camt004Message = z.infer<typeof Camt004MessageSchema>;
export type Camt029Message = z.infer<typeof Camt029MessageSchema>;
export type Camt052Message = z.infer<typeof Camt052MessageSchema>;
export type Camt053Message = z.infer<typeof Camt053MessageSchema>;
export type Camt054Message = z.infer<typeof Camt054MessageSchema>;
export type Camt056Message = z.infer<typeof Camt056MessageSchema>;
export type Camt086Message = z.infer<typeof Camt086MessageSchema>;
export type Fxtr014Message = z.infer<typeof Fxtr014MessageSchema>;
export type Sese023Message = z.infer<typeof Sese023MessageSchema>;
export type Acmt007Message = z.infer<typeof Acmt007MessageSchema>;
export type Acmt015Message = z.infer<typeof Acmt015MessageSchema>;
export type Setr004Message = z.infer<typeof Setr004MessageSchema>;
export type Setr010Message = z.infer<typeof Setr010MessageSchema>;

export type TypedRecord = z.infer<typeof TypedRecordSchema>;
export type RecordKind = TypedRecord['kind'];
export type FamilyKey = Exclude<RecordKind, 'payment'>;
export type RecordOfKind<K extends RecordKind> = Extract<TypedRecord, { kind: K }>;

/** Base fields shared by every variant, without the tag */
export type PaymentFields = Omit<PaymentMessage, 'kind'>;

export const FAMILY_KEYS: readonly FamilyKey[] = [
    'pacs.008', 'pacs.004', 'pacs.009',
    'pain.001', 'pain.002', 'pain.008',
    'camt.004', 'camt.029', 'camt.052', 'camt.053', 'camt.054', 'camt.056', 'camt.086',
    'fxtr.014', 'sese.023',
    'acmt.007', 'acmt.015',
    'setr.004', 'setr.010',
];

export function isRecordKind(value: string): value is RecordKind {
    return Object.prototype.hasOwnProperty.call(RECORD_SCHEMAS, value);
}

/**
 * Every declared field of a variant, `kind` excluded.
 */
export function fieldNames(kind: RecordKind): string[] {
    return Object.keys(RECORD_SCHEMAS[kind].shape).filter(key => key !== 'kind');
}

export interface ValidationReport {
    isValid: boolean;
    errors: string[];
}

export function makeReport(errors: string[]): ValidationReport {
    return { isValid: errors.length === 0, errors };
}
