import { consoleSink, type LineSink } from "@ledgerwire/helpers";
import { PROGRAM_ACCOUNT_LAMPORTS } from "@ledgerwire/ledger-program";

import { defaultIsRentExempt, type AccountEntity } from "./AccountEntity";

export interface ProgramAccountParams {
    id: string;
    isExecutable: boolean;
}

export class ProgramAccount implements AccountEntity {
    readonly kind = "program" as const;
    readonly id: string;
    readonly isExecutable: boolean;

    constructor(params: ProgramAccountParams) {
        this.id = params.id;
        this.isExecutable = params.isExecutable;
    }

    // Program balances are fixed rather than stored.
    lamports(): bigint {
        return PROGRAM_ACCOUNT_LAMPORTS;
    }

    infoLine(): string {
        return `Program Account: ${this.id}, Executable: ${this.isExecutable}`;
    }

    displayInfo(sink: LineSink = consoleSink): void {
        sink(this.infoLine());
    }

    isRentExempt(): boolean {
        return defaultIsRentExempt(this);
    }
}
