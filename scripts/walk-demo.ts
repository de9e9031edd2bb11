/**
 * Walk a simulated player through a small field of coins and print every
 * proximity notification. No sensors, no network: fixes are generated along
 * a straight line.
 *
 * Usage: npm run demo
 */
import {
  cardinalDirection,
  congratulationMessage,
  destinationPoint,
  formatCents,
  formatDistance,
  PROXIMITY_EVENTS,
  toCents,
  type Coin,
  type GeoPoint,
} from '@coinquest/shared';
import { createProximityConfig, fixedFindLimit, HuntSession, InMemoryWallet } from '@coinquest/hunt';

const START: GeoPoint = { latitude: 37.7749, longitude: -122.4194 };
const STEP_METERS = 3;
const STEPS = 40;

function coinAt(id: string, meters: number, bearing: number, dollars: string): Coin {
  return { id, position: destinationPoint(START, meters, bearing), value: toCents(dollars) };
}

async function main() {
  const wallet = new InMemoryWallet();
  const session = new HuntSession(fixedFindLimit(toCents('10.00')), {
    config: createProximityConfig({ collectDistance: 5, nearDistance: 30, trackingRadius: 120 }),
    wallet,
  });

  session.on(PROXIMITY_EVENTS.TARGET_SET, (coin) => console.log(`  target → ${coin.id} (${formatCents(coin.value)})`));
  session.on(PROXIMITY_EVENTS.ZONE_CHANGED, (from, to) => console.log(`  zone ${from} → ${to}`));
  session.on(PROXIMITY_EVENTS.RANGE_ENTERED, (coin) => console.log(`  ${coin.id} in reach`));
  session.on(PROXIMITY_EVENTS.LOCK_CHANGED, (locked) => console.log(`  ${locked ? 'locked' : 'unlocked'}`));
  session.on(PROXIMITY_EVENTS.TARGET_COLLECTED, (coin, value) =>
    console.log(`  collected ${coin.id}: ${formatCents(value)}. ${congratulationMessage(value)}`),
  );

  session.start([
    coinAt('north-1', 45, 0, '2.50'),
    coinAt('north-2', 95, 2, '12.00'),
    coinAt('east-1', 80, 90, '0.75'),
  ]);

  for (let step = 0; step <= STEPS; step++) {
    const position = destinationPoint(START, step * STEP_METERS, 0);
    const result = session.tick({ position, heading: 0 });
    if (!result.accepted) continue;

    const { snapshot } = result;
    const where = snapshot.distance === null ? snapshot.direction : `${formatDistance(snapshot.distance)} ${cardinalDirection(snapshot.bearing ?? 0)}`;
    console.log(`step ${step}: ${where}`);

    if (snapshot.zone === 'collectible') {
      const outcome = await session.collect();
      if (outcome.status === 'denied') console.log(`  ${outcome.message}`);
    }
  }

  console.log(`\nWallet: ${formatCents(wallet.pendingBalance)} pending, ${session.coinsRemaining} coins left`);
  session.end();
}

main().catch(console.error);
