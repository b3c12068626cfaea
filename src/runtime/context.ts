export type Runtime = {
  // machine
  machineHostname: string;
  version: string;
  commitSha?: string | null;
  configHash: string;

  // run
  startedAt: number;
};

let RUNTIME: Partial<Runtime> = {};

export function setRuntime(partial: Partial<Runtime>) {
  RUNTIME = { ...RUNTIME, ...partial };
}

export function getRuntime(): Runtime {
  const { machineHostname, version, configHash, startedAt, commitSha } = RUNTIME;
  if (
    machineHostname === undefined ||
    version === undefined ||
    configHash === undefined ||
    startedAt === undefined
  ) {
    throw new Error('Runtime not initialized');
  }
  return { machineHostname, version, configHash, startedAt, commitSha };
}

export function resetRuntime() {
  RUNTIME = {};
}
