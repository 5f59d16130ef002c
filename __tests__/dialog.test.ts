import fs from 'node:fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DialogExitCode } from '../shared/types.js';
import { Dialog, buildDialogArgs, buttonForExitCode, parseDialogOutput, type SpawnResult } from '../src/dialog.js';
import { MdmLogger } from '../src/logger.js';
import type { Platform } from '../src/platforms/base.js';
import { createPlatform } from '../src/platforms/detection.js';
import { cleanup, fakeHost, makeTempDir } from './helpers.js';

function spawnReturning(result: Partial<SpawnResult> = {}) {
  return vi.fn(async (_file: string, _args: readonly string[]): Promise<SpawnResult> => ({
    exitCode: 0,
    stdout: '',
    stderr: '',
    ...result,
  }));
}

describe('buildDialogArgs', () => {
  it('maps the config onto swiftDialog flags', () => {
    expect(
      buildDialogArgs(
        {
          title: 'Setup',
          message: 'Hello',
          icon: 'SF=gear',
          button1Text: 'OK',
          button2Text: 'Cancel',
          timer: 60,
          textFields: [{ title: 'Name', required: true, prompt: 'Full name' }],
          checkboxes: [{ label: 'Agree', checked: true }],
          selectItems: [{ title: 'Department', values: ['Sales', 'IT'], defaultValue: 'IT', required: true }],
        },
        '/tmp/cmd.log'
      )
    ).toEqual([
      '--title', 'Setup',
      '--message', 'Hello',
      '--icon', 'SF=gear',
      '--button1text', 'OK',
      '--button2text', 'Cancel',
      '--timer', '60',
      '--textfield', 'Name,required,prompt=Full name',
      '--checkbox', 'Agree,checked',
      '--selecttitle', 'Department,required',
      '--selectvalues', 'Sales,IT',
      '--selectdefault', 'IT',
      '--commandfile', '/tmp/cmd.log',
      '--json',
    ]);
  });

  it('adds window options and secure fields', () => {
    const args = buildDialogArgs(
      {
        title: 'T',
        message: 'M',
        infoButtonText: 'Help',
        width: 600,
        height: 300,
        moveable: true,
        ontop: true,
        textFields: [{ title: 'PIN', secure: true, value: '0000' }],
        checkboxes: [{ label: 'Locked', disabled: true }],
      },
      '/tmp/c.log'
    );
    expect(args.slice(4, 16)).toEqual([
      '--infobuttontext', 'Help',
      '--width', '600',
      '--height', '300',
      '--moveable',
      '--ontop',
      '--textfield', 'PIN,secure,value=0000',
      '--checkbox', 'Locked,disabled',
    ]);
  });
});

describe('dialog output', () => {
  it('maps exit codes to buttons', () => {
    expect(buttonForExitCode(DialogExitCode.Button1)).toBe('button1');
    expect(buttonForExitCode(DialogExitCode.Button2)).toBe('button2');
    expect(buttonForExitCode(DialogExitCode.InfoButton)).toBe('info');
    expect(buttonForExitCode(DialogExitCode.TimerExpired)).toBe('timer');
    expect(buttonForExitCode(DialogExitCode.UserQuit)).toBe('none');
  });

  it('splits values and selections', () => {
    expect(
      parseDialogOutput('{"Name":"Jane","Agree":true,"Count":3,"Department":{"selectedValue":"IT","selectedIndex":1}}\n')
    ).toEqual({
      values: { Name: 'Jane', Agree: true, Count: '3' },
      selections: { Department: { selectedValue: 'IT', selectedIndex: 1 } },
    });
  });

  it('ignores output that is not a JSON object', () => {
    expect(parseDialogOutput('')).toEqual({ values: {}, selections: {} });
    expect(parseDialogOutput('{broken')).toEqual({ values: {}, selections: {} });
    expect(parseDialogOutput('{"nested":{"deep":[1]}}')).toEqual({ values: {}, selections: {} });
  });
});

describe('Dialog off macOS', () => {
  it.each(['linux', 'win32'] as const)('returns an UnsupportedPlatformError failure on %s without spawning', async (name) => {
    const { host } = fakeHost();
    const platform = createPlatform(name, host);
    const spawn = spawnReturning();
    const dialog = new Dialog({ platform, host, spawn });

    expect(await dialog.show({ title: 'T', message: 'M' })).toEqual({
      ok: false,
      reason: 'UnsupportedPlatformError',
      message: platform.dialog.unavailableMessage,
    });
    expect(await dialog.notify({ title: 'T', message: 'M' })).toMatchObject({ ok: false, reason: 'UnsupportedPlatformError' });
    expect(spawn).not.toHaveBeenCalled();
  });
});

describe('Dialog on macOS', () => {
  let dir: string;
  let platform: Platform;

  beforeEach(() => {
    dir = makeTempDir('mdmkit-dialog-');
    const darwin = createPlatform('darwin', fakeHost().host);
    platform = {
      ...darwin,
      dialog: { sharedTempDir: dir, standardBinaryPath: '/usr/local/bin/dialog', dialogAvailable: true, unavailableMessage: '' },
    };
  });

  afterEach(() => {
    cleanup(dir);
  });

  it('reports a missing binary', async () => {
    const { host, pathExists } = fakeHost();
    pathExists.mockResolvedValue(false);
    const spawn = spawnReturning();

    expect(await new Dialog({ platform, host, spawn }).show({ title: 'T', message: 'M' })).toEqual({
      ok: false,
      reason: 'BinaryNotFound',
      message: 'swiftDialog was not found at /usr/local/bin/dialog',
    });
    expect(pathExists).toHaveBeenCalledWith('/usr/local/bin/dialog');
    expect(spawn).not.toHaveBeenCalled();
  });

  it('honours a custom binary path', async () => {
    const { host, pathExists } = fakeHost();
    const spawn = spawnReturning();
    await new Dialog({ platform, host, spawn, binaryPath: '/opt/dialog/bin/dialog' }).show({ title: 'T', message: 'M' });
    expect(pathExists).toHaveBeenCalledWith('/opt/dialog/bin/dialog');
    expect(spawn.mock.calls[0]?.[0]).toBe('/opt/dialog/bin/dialog');
  });

  it('spawns swiftDialog and parses the result', async () => {
    const { host } = fakeHost();
    const spawn = spawnReturning({
      exitCode: 2,
      stdout: '{"Name":"Jane","Department":{"selectedValue":"IT","selectedIndex":1}}',
    });

    const result = await new Dialog({ platform, host, spawn }).show({ title: 'Setup', message: 'Hello' });

    expect(result).toEqual({
      ok: true,
      exitCode: 2,
      button: 'button2',
      values: { Name: 'Jane' },
      selections: { Department: { selectedValue: 'IT', selectedIndex: 1 } },
    });
    const [file, args = []] = spawn.mock.calls[0] ?? [];
    expect(file).toBe('/usr/local/bin/dialog');
    expect(args.slice(0, 4)).toEqual(['--title', 'Setup', '--message', 'Hello']);
    expect(args[args.length - 1]).toBe('--json');
    const commandFile = args[args.indexOf('--commandfile') + 1] ?? '';
    expect(commandFile.startsWith(`${dir}/mdmkit-dialog-`)).toBe(true);
    expect(commandFile.endsWith('.log')).toBe(true);
  });

  it('streams updates to the running dialog and removes the command file', async () => {
    const { host } = fakeHost();
    let commandFile = '';
    let written = '';
    const dialog: Dialog = new Dialog({
      platform,
      host,
      spawn: async (_file, args) => {
        commandFile = args[args.indexOf('--commandfile') + 1] ?? '';
        expect(await dialog.update('progress: 50')).toBe(true);
        expect(await dialog.update('progresstext: Installing')).toBe(true);
        written = fs.readFileSync(commandFile, 'utf-8');
        return { exitCode: DialogExitCode.CommandFileQuit, stdout: '', stderr: '' };
      },
    });

    const result = await dialog.show({ title: 'Installing', message: 'Please wait' });

    expect(result).toMatchObject({ ok: true, exitCode: 5, button: 'none' });
    expect(written).toBe('progress: 50\nprogresstext: Installing\n');
    expect(fs.existsSync(commandFile)).toBe(false);
    expect(await dialog.update('progress: 100')).toBe(false);
  });

  it('reports a spawn failure', async () => {
    const { host } = fakeHost();
    const logger = new MdmLogger({ console: false });
    const error = vi.spyOn(logger, 'error');
    const spawn = vi.fn(async (): Promise<SpawnResult> => {
      throw new Error('EACCES');
    });

    expect(await new Dialog({ platform, host, spawn, logger }).show({ title: 'T', message: 'M' })).toEqual({
      ok: false,
      reason: 'SpawnFailed',
      message: 'Failed to launch swiftDialog: Error: EACCES',
    });
    expect(error).toHaveBeenCalledWith('Failed to launch swiftDialog: Error: EACCES');
  });

  it('sends notifications', async () => {
    const { host } = fakeHost();
    const spawn = spawnReturning();

    expect(
      await new Dialog({ platform, host, spawn }).notify({ title: 'Done', message: 'Installed', subtitle: 'Slack' })
    ).toEqual({ ok: true, exitCode: 0, button: 'none', values: {}, selections: {} });
    expect(spawn).toHaveBeenCalledWith('/usr/local/bin/dialog', [
      '--notification',
      '--title', 'Done',
      '--message', 'Installed',
      '--subtitle', 'Slack',
    ]);
  });
});
