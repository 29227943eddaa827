export type HashAlgo = "sha256" | "sha512";

export type VerifyMode = "none" | "size" | "hash";

export type TransferRequest = {
  source: string;
  destination: string;
  allow_upgrade?: boolean; // caller has established the source is a quality upgrade
};

export type TransferOptions = {
  forceOverwrite: boolean;
  safeCopy: boolean; // always stage through `<destination>.partial~`
  dryRun: boolean;
  verify: VerifyMode;
  hashAlgo: HashAlgo;
  onProgress?: OnTransferProgress;
};

export type TransferAction =
  | "direct_move"
  | "staged_copy"
  | "rejected_self"
  | "rejected_duplicate"
  | "failed";

export type SourceState = "removed" | "retained";

export type DestinationState = "created" | "replaced" | "unchanged";

export type TransferOutcome = {
  ok: boolean;
  action: TransferAction;
  source_state: SourceState;
  destination_state: DestinationState;
  dry_run: boolean;
  bytes: number;
  hash?: string; // digest of the staged copy, when verify = "hash"
  error?: string;
};

export type TransferProgressEvent =
  | { type: "transfer.start"; source: string; destination: string; bytes: number }
  | {
      type: "transfer.copy.progress";
      destination: string;
      bytes_copied: number;
      total_bytes: number;
    }
  | { type: "transfer.done"; outcome: TransferOutcome; elapsed_ms: number };

export type OnTransferProgress = (event: TransferProgressEvent) => void;
