import { NOOP_LOGGER, type Logger } from "@ledgerwire/helpers";

import type { TransactionRecord } from "./TransactionRecord";

export interface TransactionValidation {
    index: number;
    signature: string;
    valid: boolean;
}

export interface ValidationSummary {
    total: number;
    valid: number;
    invalid: number;
}

export interface ValidateAllOptions {
    logger?: Logger;
}

/**
 * Checks every transaction and reports each one in input order. A failure
 * never stops the remaining checks.
 */
export function validateAll(
    transactions: readonly TransactionRecord[],
    options: ValidateAllOptions = {},
): TransactionValidation[] {
    const logger = options.logger ?? NOOP_LOGGER;
    logger.debug(`Validating ${transactions.length} transactions`);

    return transactions.map((transaction, index) => {
        const valid = transaction.isValid();
        const signature = transaction.signature();
        logger.debug(`Transaction #${index + 1}: valid=${valid}`, { signature });
        return { index, signature, valid };
    });
}

export function summarizeValidations(report: readonly TransactionValidation[]): ValidationSummary {
    const valid = report.filter((entry) => entry.valid).length;
    return { total: report.length, valid, invalid: report.length - valid };
}
