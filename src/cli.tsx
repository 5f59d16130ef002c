#!/usr/bin/env node
import React, {useCallback, useEffect, useState} from 'react';
import {render, Box, Text, useInput, useApp} from 'ink';
import isRoot from 'is-root';
import type {ConsoleUser} from '../shared/types.js';
import {describeError} from './errors.js';
import {VERSION} from './index.js';
import {resolveProvider} from './mdm/index.js';
import {getPlatform} from './platforms/detection.js';
import {SystemInfo} from './system-info.js';

interface Snapshot {
  hostname: string;
  osLabel: string;
  serial: string | null;
  user: ConsoleUser | null;
  fullName: string | null;
  provider: string;
}

async function collectSnapshot(): Promise<Snapshot> {
  const [serial, user] = await Promise.all([SystemInfo.getSerialNumber(), SystemInfo.getConsoleUser()]);
  const fullName = user ? await SystemInfo.getUserFullName(user.username) : null;

  let provider: string;
  try {
    provider = resolveProvider(getPlatform().name);
  } catch (error) {
    provider = `unavailable (${describeError(error)})`;
  }

  return {
    hostname: SystemInfo.getHostname(),
    osLabel: SystemInfo.getOsVersionLabel(),
    serial,
    user,
    fullName,
    provider,
  };
}

const header = () => (
  <Box flexDirection="column">
    <Text><Text color="cyanBright">mdmkit-info</Text> <Text dimColor>v{VERSION}</Text></Text>
    <Text dimColor>m enrollment • r refresh • q quit</Text>
    {!isRoot() ? <Text color="yellow">Tip: run with sudo for enrollment and serial details.</Text> : <Text color="green">Running as root.</Text>}
  </Box>
);

function row(label: string, value: string | null) {
  return (
    <Text>
      {label.padEnd(14)}
      {value ? <Text>{value}</Text> : <Text dimColor>unknown</Text>}
    </Text>
  );
}

const App: React.FC = () => {
  const {exit} = useApp();
  const [snapshot, setSnapshot] = useState<Snapshot | null>(null);
  const [enrollment, setEnrollment] = useState<string | null>(null);
  const [failure, setFailure] = useState<string | null>(null);

  const refresh = useCallback(() => {
    collectSnapshot()
      .then((next) => { setSnapshot(next); setFailure(null); })
      .catch((error: unknown) => setFailure(describeError(error)));
  }, []);

  useEffect(() => { refresh(); }, [refresh]);

  useEffect(() => {
    if (!enrollment) return;
    const t = setTimeout(() => setEnrollment(null), 8000);
    return () => clearTimeout(t);
  }, [enrollment]);

  useInput((input, key) => {
    if (input === 'q' || key.escape) exit();
    if (input === 'r') refresh();
    if (input === 'm') {
      SystemInfo.getMdmEnrollmentStatus()
        .then((status) => setEnrollment(status ?? 'No MDM enrollment information available.'))
        .catch((error: unknown) => setFailure(describeError(error)));
    }
  });

  return (
    <Box flexDirection="column">
      {header()}
      {snapshot ? (
        <Box flexDirection="column" borderStyle="round" marginTop={1} paddingX={1}>
          {row('Hostname', snapshot.hostname)}
          {row('OS', snapshot.osLabel)}
          {row('Serial', snapshot.serial)}
          {row('Console user', snapshot.user ? `${snapshot.user.username} (uid ${snapshot.user.uid})` : null)}
          {row('Full name', snapshot.fullName)}
          {row('Home', snapshot.user?.homeDir ?? null)}
          {row('MDM provider', snapshot.provider)}
        </Box>
      ) : <Box marginTop={1}><Text dimColor>Collecting system information...</Text></Box>}
      {enrollment && <Box marginTop={1} borderStyle="round"><Text>{enrollment}</Text></Box>}
      {failure && <Box marginTop={1}><Text color="red">{failure}</Text></Box>}
    </Box>
  );
};

render(<App />);
