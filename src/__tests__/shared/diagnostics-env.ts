export interface DiagnosticsEnvSnapshot {
  diagnostics?: string | undefined;
  diagnosticsDetail?: string | undefined;
}

const restoreEnv = (key: string, previous: string | undefined): void => {
  if (previous === undefined) {
    Reflect.deleteProperty(process.env, key);
    return;
  }
  process.env[key] = previous;
};

export function enableDiagnosticsEnv(detail = '0'): DiagnosticsEnvSnapshot {
  const previousEnabled = process.env['HEADR_DIAGNOSTICS'];
  const previousDetail = process.env['HEADR_DIAGNOSTICS_DETAIL'];
  process.env['HEADR_DIAGNOSTICS'] = '1';
  process.env['HEADR_DIAGNOSTICS_DETAIL'] = detail;
  return {
    diagnostics: previousEnabled,
    diagnosticsDetail: previousDetail,
  };
}

export function restoreDiagnosticsEnv(snapshot: DiagnosticsEnvSnapshot): void {
  restoreEnv('HEADR_DIAGNOSTICS', snapshot.diagnostics);
  restoreEnv('HEADR_DIAGNOSTICS_DETAIL', snapshot.diagnosticsDetail);
}
