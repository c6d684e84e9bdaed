import { consoleSink, type LineSink } from "@ledgerwire/helpers";

import { defaultIsRentExempt, type AccountEntity } from "./AccountEntity";

export interface UserAccountParams {
    name: string;
    lamports: bigint;
}

export class UserAccount implements AccountEntity {
    readonly kind = "user" as const;
    readonly name: string;
    private readonly balance: bigint;

    constructor(params: UserAccountParams) {
        if (params.lamports < 0n) {
            throw new Error("lamports must be non-negative");
        }
        this.name = params.name;
        this.balance = params.lamports;
    }

    lamports(): bigint {
        return this.balance;
    }

    infoLine(): string {
        return `User Account: ${this.name}, Balance: ${this.balance.toString()} lamports`;
    }

    displayInfo(sink: LineSink = consoleSink): void {
        sink(this.infoLine());
    }

    isRentExempt(): boolean {
        return defaultIsRentExempt(this);
    }
}
