import assert from 'node:assert/strict';
import { test } from 'node:test';
import { SessionExistsError, TmuxNotInstalledError } from '../src/core/errors.ts';
import { TmuxDriver, buildCapturePaneArgs } from '../src/pty/tmux-driver.ts';
import { FakeTmux } from './support/fake-tmux.ts';

void test('tmux driver creates a detached session then raises its history limit', async () => {
  const tmux = new FakeTmux();
  const driver = new TmuxDriver(tmux.runner);

  await driver.createSession('ciab_demo', '/work/demo', 'claude', 10000);

  assert.deepEqual(tmux.calls, [
    ['new-session', '-d', '-s', 'ciab_demo', '-c', '/work/demo', 'claude'],
    ['set-option', '-t', '=ciab_demo', 'history-limit', '10000'],
  ]);
  assert.equal(await driver.hasSession('ciab_demo'), true);
  assert.equal(await driver.hasSession('ciab_other'), false);
});

void test('tmux driver maps a duplicate session to a session-exists error', async () => {
  const tmux = new FakeTmux();
  tmux.sessions.add('ciab_demo');
  const driver = new TmuxDriver(tmux.runner);

  await assert.rejects(
    driver.createSession('ciab_demo', '/work', 'claude', 10000),
    (error: unknown) => error instanceof SessionExistsError && error.sessionName === 'ciab_demo',
  );
});

void test('tmux driver lists only prefixed sessions and treats a missing server as empty', async () => {
  const tmux = new FakeTmux();
  const driver = new TmuxDriver(tmux.runner);

  assert.deepEqual(await driver.listSessions(), []);

  tmux.sessions.add('ciab_a');
  tmux.sessions.add('ciab_b');
  assert.deepEqual(await driver.listSessions(), ['ciab_a', 'ciab_b']);
  assert.deepEqual(tmux.calls.at(-1), ['list-sessions', '-F', '#{session_name}']);
});

void test('tmux driver kills sessions by exact target', async () => {
  const tmux = new FakeTmux();
  tmux.sessions.add('ciab_demo');
  const driver = new TmuxDriver(tmux.runner);

  assert.equal(await driver.killSession('ciab_demo'), true);
  assert.equal(await driver.killSession('ciab_demo'), false);
  assert.deepEqual(tmux.calls[0], ['kill-session', '-t', '=ciab_demo']);
});

void test('capture-pane arguments follow the capture options', () => {
  assert.deepEqual(
    buildCapturePaneArgs('ciab_x', {
      historyLines: 40,
      includeEscapeSequences: true,
      joinWrappedLines: true,
    }),
    ['capture-pane', '-p', '-e', '-J', '-t', '=ciab_x', '-S', '-40'],
  );
  assert.deepEqual(
    buildCapturePaneArgs('ciab_x', {
      historyLines: 0,
      includeEscapeSequences: false,
      joinWrappedLines: false,
    }),
    ['capture-pane', '-p', '-t', '=ciab_x'],
  );
});

void test('tmux driver returns captured pane text', async () => {
  const tmux = new FakeTmux();
  tmux.sessions.add('ciab_demo');
  tmux.paneText = 'line one\nline two\n';
  const driver = new TmuxDriver(tmux.runner);

  const text = await driver.capturePane('ciab_demo', {
    historyLines: 5,
    includeEscapeSequences: false,
    joinWrappedLines: true,
  });

  assert.equal(text, 'line one\nline two\n');
  assert.deepEqual(tmux.calls[0], ['capture-pane', '-p', '-J', '-t', '=ciab_demo', '-S', '-5']);
});

void test('tmux driver reports a missing binary as tmux-not-installed', async () => {
  const tmux = new FakeTmux();
  tmux.installed = false;
  const driver = new TmuxDriver(tmux.runner);

  assert.equal(await driver.isInstalled(), false);
  await assert.rejects(driver.checkInstalled(), TmuxNotInstalledError);
  await assert.rejects(driver.hasSession('ciab_demo'), TmuxNotInstalledError);
});
