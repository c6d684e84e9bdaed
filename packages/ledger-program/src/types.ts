export type InitializeInstruction = { kind: "initialize" };

export interface CreateAccountInstruction {
  kind: "create_account";
  lamports: number;
  accountId: number;
}

export interface TransferInstruction {
  kind: "transfer";
  amount: number;
  recipientId: number;
}

export interface MintInstruction {
  kind: "mint";
  amount: number;
  recipientId: number;
  decimals: number;
}

export interface BurnInstruction {
  kind: "burn";
  amount: number;
  accountId: number;
}

export type Instruction =
  | InitializeInstruction
  | CreateAccountInstruction
  | TransferInstruction
  | MintInstruction
  | BurnInstruction;

export type InstructionKind = Instruction["kind"];

export type InstructionOf<K extends InstructionKind> = Extract<Instruction, { kind: K }>;

export interface AccountRecord {
  typeTag: number;
  lamports: number;
  nameLength: number;
  nameBytes: Uint8Array;
  name: string;
}

export interface AccountRecordInput {
  typeTag: number;
  lamports: number;
  name: string;
}

export type OperationResult =
  | { operation: "initialize" }
  | { operation: "create_account"; lamports: number; accountId: number }
  | { operation: "transfer"; amount: number; recipientId: number }
  | { operation: "mint"; amount: number; recipientId: number; decimals: number }
  | { operation: "burn"; amount: number; accountId: number }
  | { operation: "transfer_skipped"; payloadLength: number };
