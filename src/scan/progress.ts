export type ScanProgressPhase = "repositories" | "components";

export type ScanProgressEvent = {
  phase: ScanProgressPhase;
  current: number;
  total: number;
  message?: string;
};

export type ScanProgressHandler = (event: ScanProgressEvent) => void;
