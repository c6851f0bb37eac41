import { summarizeByPeriod } from '../aggregation';
import {
  escapeCsvCell,
  periodSeriesToCsv,
  periodSeriesToJson,
  workoutsToCsv,
  workoutsToJson,
} from '../export';
import { makeRecord } from './helpers';

const WORKOUT_HEADER =
  'activityType,localDate,startTime,endTime,durationSeconds,distanceKm,energyKcal,' +
  'avgHeartRateBpm,avgPowerWatts,avgMets,elevationAscendedM,sourceName,routeReference,metadata';

const PERIOD_HEADER =
  'period,recordCount,durationSeconds_sum,distanceKm_sum,energyKcal_sum,' +
  'avgHeartRateBpm_sum,avgPowerWatts_sum,avgMets_sum,elevationAscendedM_sum';

describe('escapeCsvCell', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvCell('Running')).toBe('Running');
    expect(escapeCsvCell(0)).toBe('0');
    expect(escapeCsvCell(undefined)).toBe('');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(escapeCsvCell('a,b')).toBe('"a,b"');
    expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvCell('two\nlines')).toBe('"two\nlines"');
  });
});

describe('workoutsToCsv', () => {
  it('writes a header and one CRLF-terminated row per workout', () => {
    const record = makeRecord({
      metrics: { distanceKm: 5, energyKcal: 0 },
      sourceName: 'Watch, "Series 9"',
    });

    expect(workoutsToCsv([record])).toBe(
      `${WORKOUT_HEADER}\r\n` +
        'Running,2024-01-15,2024-01-15T08:00:00.000Z,2024-01-15T08:30:00.000Z,1800,5,0,,,,,' +
        '"Watch, ""Series 9""",,\r\n',
    );
  });

  it('writes only the header for no workouts', () => {
    expect(workoutsToCsv([])).toBe(`${WORKOUT_HEADER}\r\n`);
  });

  it('includes the route reference', () => {
    const record = makeRecord({ routeReference: '/workout-routes/route_1.gpx' });

    const lines = workoutsToCsv([record]).split('\r\n');

    expect(lines[1].endsWith(',,/workout-routes/route_1.gpx,')).toBe(true);
  });

  it('writes metadata entries as a quoted JSON array', () => {
    const record = makeRecord({
      metadata: [
        { key: 'HKIndoorWorkout', raw: '0', value: false },
        { key: 'HKElevationAscended', raw: '1200 cm', unit: 'm', value: 12 },
      ],
    });

    const lines = workoutsToCsv([record]).split('\r\n');

    expect(lines[1]).toBe(
      'Running,2024-01-15,2024-01-15T08:00:00.000Z,2024-01-15T08:30:00.000Z,1800,,,,,,,,,' +
        '"[{""key"":""HKIndoorWorkout"",""raw"":""0"",""value"":false},' +
        '{""key"":""HKElevationAscended"",""raw"":""1200 cm"",""unit"":""m"",""value"":12}]"',
    );
  });
});

describe('periodSeriesToCsv', () => {
  it('writes metric sums per period', () => {
    const buckets = summarizeByPeriod(
      [makeRecord({ localDate: '2024-01-10', metrics: { distanceKm: 5 } })],
      'month',
    );

    expect(periodSeriesToCsv(buckets)).toBe(`${PERIOD_HEADER}\r\n2024-01,1,1800,5,,,,,\r\n`);
  });

  it('adds smoothed columns when present', () => {
    const buckets = summarizeByPeriod(
      [makeRecord({ localDate: '2024-01-10' }), makeRecord({ localDate: '2024-02-10' })],
      'month',
      { smoothingWindow: 2 },
    );

    const [header, first, second] = periodSeriesToCsv(buckets).split('\r\n');

    expect(header.endsWith(',recordCount_smoothed,durationSeconds_smoothed,distanceKm_smoothed,' +
      'energyKcal_smoothed,avgHeartRateBpm_smoothed,avgPowerWatts_smoothed,avgMets_smoothed,' +
      'elevationAscendedM_smoothed')).toBe(true);
    expect(first).toBe('2024-01,1,1800,,,,,,,,,,,,,,');
    expect(second).toBe('2024-02,1,1800,,,,,,,1,1800,,,,,,');
  });
});

describe('JSON exports', () => {
  const generatedAt = new Date('2024-06-01T12:00:00.000Z');

  it('wraps workouts in a document with ISO dates', () => {
    const record = makeRecord({ metrics: { distanceKm: 5 } });

    const document: unknown = JSON.parse(workoutsToJson([record], generatedAt));

    expect(document).toEqual({
      count: 1,
      data: [
        {
          activityType: 'Running',
          durationSeconds: 1800,
          endTime: '2024-01-15T08:30:00.000Z',
          localDate: '2024-01-15',
          metadata: [],
          metrics: { distanceKm: 5 },
          startTime: '2024-01-15T08:00:00.000Z',
        },
      ],
      generatedAt: '2024-06-01T12:00:00.000Z',
    });
  });

  it('wraps period buckets', () => {
    const buckets = summarizeByPeriod([makeRecord()], 'year');

    const document: unknown = JSON.parse(periodSeriesToJson(buckets, generatedAt));

    expect(document).toMatchObject({
      count: 1,
      data: [{ period: { granularity: 'year', label: '2024' }, summary: { recordCount: 1 } }],
    });
  });
});
