import { describe, expect, test } from 'vitest';

import { ResourceAcquisitionError, StartupError } from '../core/errors.js';
import { TEST_FORM } from '../core/__fixtures__/form.js';
import { createSimulatedFactory } from './simulated.js';

const consent = TEST_FORM.sections[0]?.fields[0];

describe('createSimulatedFactory', () => {
  test('tracks open browsers and closes each one once', async () => {
    const factory = createSimulatedFactory();

    const a = await factory.launch({ headless: true });
    const b = await factory.launch({ headless: true });
    await a.close();
    await a.close();

    expect(factory.stats).toMatchObject({ launches: 2, closes: 1, closeCalls: 2, open: 1, maxOpen: 2 });
    await b.close();
    expect(factory.stats.open).toBe(0);
  });

  test('closing rejects the call still in flight', async () => {
    const factory = createSimulatedFactory({ latencyMs: 20 });
    const driver = await factory.launch({ headless: true });

    const navigating = expect(driver.navigate('https://forms.test', 1_000)).rejects.toThrow(
      'Browser has been closed',
    );
    await driver.close();

    await navigating;
  });

  test('calls after close fail', async () => {
    const factory = createSimulatedFactory();
    const driver = await factory.launch({ headless: true });
    await driver.close();

    await expect(driver.submit()).rejects.toThrow('Browser has been closed');
  });

  test('launch faults become acquisition errors', async () => {
    const factory = createSimulatedFactory({
      fault: (call) => (call.operation === 'launch' ? new Error('out of memory') : undefined),
    });

    await expect(factory.launch({ headless: true })).rejects.toThrow(
      new ResourceAcquisitionError('out of memory'),
    );
    expect(factory.stats.open).toBe(0);
  });

  test('probe faults become startup errors', async () => {
    const factory = createSimulatedFactory({
      fault: (call) => (call.operation === 'probe' ? new Error('no display') : undefined),
    });

    await expect(factory.probe({ headless: true })).rejects.toThrow(
      new StartupError('Cannot launch browser: no display'),
    );
  });

  test('records filled answers and field ids', async () => {
    if (consent === undefined) throw new Error('fixture changed');
    const factory = createSimulatedFactory();
    const driver = await factory.launch({ headless: true });

    const handle = await driver.locateField(consent, 1_000);
    if (handle === null) throw new Error('expected a handle');
    await driver.setFieldValue(handle, { kind: 'consent', fieldId: 'consent' });

    expect(factory.stats.filled).toEqual([{ kind: 'consent', fieldId: 'consent' }]);
    expect(factory.stats.calls.map((c) => [c.operation, c.fieldId])).toEqual([
      ['launch', undefined],
      ['locate', 'consent'],
      ['fill', 'consent'],
    ]);
  });
});
