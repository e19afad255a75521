import { describe, test, expect } from '@jest/globals';
import { errors } from 'playwright';
import { PlaywrightBrowser } from '../../../core/browser/playwrightBrowser.js';
import { CaptureError, SessionError } from '../../../core/shared/errors.js';
import { createMockContext, createMockPage, createRecordingLogger } from '../../utils/mocks.js';

function setup(options: { showPointer?: boolean } = {}) {
  const first = createMockPage({ url: 'https://example.com/', title: 'Home', bodyText: 'Welcome' });
  const second = createMockPage({ url: 'https://example.com/offer', title: 'Offer' });
  const { context, close } = createMockContext([first.page, second.page]);
  const logger = createRecordingLogger();
  const browser = new PlaywrightBrowser(
    { browser: null, context, page: first.page, ownsContext: true },
    logger,
    { showPointer: options.showPointer ?? false, navigationTimeoutMs: 1000 }
  );
  return { browser, first, second, closeContext: close, logger };
}

describe('PlaywrightBrowser', () => {
  test('capture collects the page state', async () => {
    const { browser } = setup();

    const observation = await browser.capture();

    expect(observation).toMatchObject({
      url: 'https://example.com/',
      title: 'Home',
      markup: '<html><body><h1>Example</h1></body></html>',
      scriptText: 'console.log("hi")',
      visibleText: 'Welcome'
    });
    expect(observation.screenshot.toString()).toBe('fake-image');
  });

  test('capture failures become CaptureError', async () => {
    const { browser, first } = setup();
    first.evaluate.mockRejectedValueOnce(new Error('Execution context was destroyed'));

    const run = browser.capture();

    await expect(run).rejects.toBeInstanceOf(CaptureError);
    await expect(run).rejects.toThrow('Failed to capture page state: Execution context was destroyed');
  });

  test('pointer and keyboard calls go to the active page', async () => {
    const { browser, first } = setup();

    await browser.pointerClick(5, 6, { button: 'right', clickCount: 1 });
    await browser.pointerMove(1, 2);
    await browser.pointerDown();
    await browser.pointerUp();
    await browser.wheel(0, 300);
    await browser.keyType('laptops');
    await browser.keyPress('Enter');

    expect(first.mouse.click).toHaveBeenCalledWith(5, 6, { button: 'right', clickCount: 1 });
    expect(first.mouse.move).toHaveBeenCalledWith(1, 2);
    expect(first.mouse.down).toHaveBeenCalledTimes(1);
    expect(first.mouse.up).toHaveBeenCalledTimes(1);
    expect(first.mouse.wheel).toHaveBeenCalledWith(0, 300);
    expect(first.keyboard.type).toHaveBeenCalledWith('laptops');
    expect(first.keyboard.press).toHaveBeenCalledWith('Enter');
  });

  test('navigate loads the URL in the active page', async () => {
    const { browser, first } = setup();

    await browser.navigate('https://example.com/docs');

    expect(first.goto).toHaveBeenCalledWith('https://example.com/docs', { waitUntil: 'domcontentloaded', timeout: 1000 });
  });

  test('shows the click marker only when enabled', async () => {
    const hidden = setup();
    await hidden.browser.pointerClick(5, 6, { button: 'left', clickCount: 1 });
    expect(hidden.first.evaluate).not.toHaveBeenCalled();

    const shown = setup({ showPointer: true });
    await shown.browser.pointerClick(5, 6, { button: 'left', clickCount: 1 });
    expect(shown.first.evaluate).toHaveBeenCalledTimes(1);
    expect(shown.first.evaluate.mock.calls[0]?.[1]).toEqual({ px: 5, py: 6 });
  });

  test('lists pages in opening order and marks the active one', async () => {
    const { browser } = setup();

    await expect(browser.listOpenPages()).resolves.toEqual([
      { index: 0, url: 'https://example.com/', title: 'Home', active: true },
      { index: 1, url: 'https://example.com/offer', title: 'Offer', active: false }
    ]);
  });

  test('activatePage moves input to the chosen tab', async () => {
    const { browser, second } = setup();

    await browser.activatePage(1);
    await browser.keyPress('PageDown');

    expect(second.bringToFront).toHaveBeenCalledTimes(1);
    expect(second.keyboard.press).toHaveBeenCalledWith('PageDown');
    expect((await browser.listOpenPages()).map(page => page.active)).toEqual([false, true]);
  });

  test('activatePage rejects a missing index', async () => {
    const { browser } = setup();

    await expect(browser.activatePage(4)).rejects.toThrow('No open page at index 4');
  });

  test('falls back to the newest tab when the active one closed', async () => {
    const { browser, first, second, logger } = setup();
    first.isClosed.mockReturnValue(true);

    await browser.keyPress('Escape');

    expect(second.keyboard.press).toHaveBeenCalledWith('Escape');
    expect(logger.messages('WARN')).toContain('Active tab was closed; switching to the most recent tab');
  });

  test('waitForLoadSignal reports a timeout as false', async () => {
    const { browser, first } = setup();
    first.waitForLoadState.mockRejectedValueOnce(new errors.TimeoutError('Timeout 100ms exceeded.'));

    await expect(browser.waitForLoadSignal(100)).resolves.toBe(false);
    await expect(browser.waitForLoadSignal(100)).resolves.toBe(true);
    expect(first.waitForLoadState).toHaveBeenLastCalledWith('networkidle', { timeout: 100 });
  });

  test('close releases the context it owns', async () => {
    const { browser, closeContext } = setup();

    await browser.close();

    expect(closeContext).toHaveBeenCalledTimes(1);
  });

  test('close reports a failed shutdown', async () => {
    const { browser, closeContext } = setup();
    closeContext.mockRejectedValueOnce(new Error('already closed'));

    await expect(browser.close()).rejects.toBeInstanceOf(SessionError);
  });
});
