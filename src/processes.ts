import psList from 'ps-list';

export type ProcInfo = { pid: number; ppid?: number; name: string; cmd?: string; uid?: number };

export async function listProcesses(): Promise<ProcInfo[]> {
  const all = await psList();
  return all.map((p) => {
    const result: ProcInfo = { pid: p.pid, ppid: p.ppid, name: p.name };
    if (p.cmd) result.cmd = p.cmd;
    if (p.uid !== undefined) result.uid = p.uid;
    return result;
  });
}

/** Case-insensitive match on the process name, ignoring a trailing `.exe`. */
export function matchesProcessName(proc: ProcInfo, name: string): boolean {
  const normalize = (value: string) => value.trim().toLowerCase().replace(/\.exe$/, '');
  return normalize(proc.name) === normalize(name);
}

export async function isProcessRunning(
  name: string,
  list: () => Promise<ProcInfo[]> = listProcesses
): Promise<boolean> {
  const procs = await list();
  return procs.some((proc) => matchesProcessName(proc, name));
}
