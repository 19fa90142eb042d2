import { HysteresisGate } from '../HysteresisGate';
import { createEntity, createSample } from '../../../__tests__/fixtures/trafficFixtures';

describe('HysteresisGate', () => {
  let gate: HysteresisGate;

  beforeEach(() => {
    gate = new HysteresisGate(2000);
  });

  it('starts a pending state for a new candidate', () => {
    const entity = createEntity();

    expect(gate.apply(entity, 'PARKED', 1000)).toBeNull();
    expect(entity.confirmedState).toBe('UNKNOWN');
    expect(entity.pendingState).toBe('PARKED');
    expect(entity.pendingSince).toBe(1000);
  });

  it('keeps waiting while the window has not elapsed', () => {
    const entity = createEntity({ pendingState: 'PARKED', pendingSince: 1000 });

    expect(gate.apply(entity, 'PARKED', 2999)).toBeNull();
    expect(entity.pendingState).toBe('PARKED');
    expect(entity.pendingSince).toBe(1000);
    expect(entity.confirmedState).toBe('UNKNOWN');
  });

  it('confirms exactly when the window has elapsed', () => {
    const entity = createEntity({
      pendingState: 'TAXIING',
      pendingSince: 1000,
      confirmedState: 'PARKED',
      telemetry: createSample({ airspeedKt: 12 }),
    });

    const event = gate.apply(entity, 'TAXIING', 3000);

    expect(event).toEqual({
      id: 'CCA101',
      oldState: 'PARKED',
      newState: 'TAXIING',
      telemetry: createSample({ airspeedKt: 12 }),
      voice: 'en-GB-RyanNeural',
      occurredAt: 3000,
    });
    expect(entity.confirmedState).toBe('TAXIING');
    expect(entity.pendingState).toBeNull();
    expect(entity.pendingSince).toBeNull();
  });

  it('does not emit again once the state is confirmed', () => {
    const entity = createEntity({ pendingState: 'PARKED', pendingSince: 0 });

    expect(gate.apply(entity, 'PARKED', 2000)).not.toBeNull();
    expect(gate.apply(entity, 'PARKED', 2500)).toBeNull();
    expect(gate.apply(entity, 'PARKED', 10000)).toBeNull();
    expect(entity.confirmedState).toBe('PARKED');
  });

  it('restarts the timer when a different candidate interrupts', () => {
    const entity = createEntity({ confirmedState: 'PARKED', pendingState: 'TAKEOFF_ROLL', pendingSince: 0 });

    expect(gate.apply(entity, 'TAXIING', 1500)).toBeNull();
    expect(entity.pendingState).toBe('TAXIING');
    expect(entity.pendingSince).toBe(1500);

    // 2000 ms after the first candidate but only 500 ms after the second
    expect(gate.apply(entity, 'TAXIING', 2000)).toBeNull();
    expect(entity.confirmedState).toBe('PARKED');
  });

  it('clears the pending state when the candidate matches the confirmed state', () => {
    const entity = createEntity({ confirmedState: 'PARKED', pendingState: 'TAXIING', pendingSince: 0 });

    expect(gate.apply(entity, 'PARKED', 500)).toBeNull();
    expect(entity.pendingState).toBeNull();
    expect(entity.pendingSince).toBeNull();
    expect(entity.confirmedState).toBe('PARKED');
  });

  it('copies telemetry into the event', () => {
    const entity = createEntity({ pendingState: 'PARKED', pendingSince: 0 });
    const event = gate.apply(entity, 'PARKED', 2000);

    entity.telemetry.airspeedKt = 99;
    expect(event?.telemetry.airspeedKt).toBe(0);
  });

  it('confirms on the next observation with a zero window', () => {
    const immediate = new HysteresisGate(0);
    const entity = createEntity();

    expect(immediate.apply(entity, 'PARKED', 100)).toBeNull();
    expect(immediate.apply(entity, 'PARKED', 100)?.newState).toBe('PARKED');
  });
});
