type ReadinessReason = string | null;

let dbReady = false;
let dbReason: ReadinessReason = 'init';

export function setDbReady(ready: boolean, reason: ReadinessReason = null) {
  dbReady = ready;
  dbReason = ready ? null : reason;
}

export function getReadiness() {
  return {
    dbReady,
    dbReason,
  };
}
