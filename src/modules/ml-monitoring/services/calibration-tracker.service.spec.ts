import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CALIBRATION_GATE_BREACHED, CalibrationTrackerService } from './calibration-tracker.service';
import { CalibrationEvent, MatchOutcome } from '../entities/calibration-event.entity';
import { ModelMetricsDaily } from '../entities/model-metrics-daily.entity';
import { MarketProbability } from '../../markets/entities/market-probability.entity';
import { ModelRegistryService } from '../../model-registry/services/model-registry.service';
import { QueueService } from '../../queue/services/queue.service';
import { MetricsService } from '../../../common/services/metrics.service';
import { InvalidSignalError } from '../../../common/errors/domain.errors';

describe('CalibrationTrackerService', () => {
  let service: CalibrationTrackerService;
  let metrics: MetricsService;

  const insertBuilder = {
    insert: jest.fn(),
    into: jest.fn(),
    values: jest.fn(),
    orIgnore: jest.fn(),
    returning: jest.fn(),
    execute: jest.fn(),
  };

  const mockEventRepository = {
    find: jest.fn(),
    findOne: jest.fn(),
    createQueryBuilder: jest.fn(),
  };
  const mockDailyRepository = {
    find: jest.fn(),
    upsert: jest.fn(),
    delete: jest.fn(),
  };
  const mockMarketProbabilityRepository = {
    find: jest.fn(),
  };
  const mockRegistry = {
    findById: jest.fn(),
  };
  const mockQueue = {
    scheduleCalibrationRecompute: jest.fn(),
  };

  const settings: Record<string, number> = {
    'calibration.windowDays': 7,
    'calibration.accuracyFloor': 0.45,
    'calibration.eceCeil': 0.08,
    'calibration.minSamples': 2,
    'calibration.bins': 10,
    'calibration.driftThreshold': 0.05,
  };

  // Rows as Postgres returns them, decimals as strings
  function row(pHome: string, pDraw: string, pAway: string, outcome: MatchOutcome) {
    return { pHome, pDraw, pAway, outcome };
  }

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CalibrationTrackerService,
        MetricsService,
        { provide: getRepositoryToken(CalibrationEvent), useValue: mockEventRepository },
        { provide: getRepositoryToken(ModelMetricsDaily), useValue: mockDailyRepository },
        { provide: getRepositoryToken(MarketProbability), useValue: mockMarketProbabilityRepository },
        { provide: ModelRegistryService, useValue: mockRegistry },
        { provide: QueueService, useValue: mockQueue },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => settings[key]) } },
      ],
    }).compile();

    service = module.get<CalibrationTrackerService>(CalibrationTrackerService);
    metrics = module.get<MetricsService>(MetricsService);

    jest.clearAllMocks();
    mockEventRepository.createQueryBuilder.mockImplementation(() => insertBuilder);
    for (const step of ['insert', 'into', 'values', 'orIgnore', 'returning'] as const) {
      insertBuilder[step].mockReturnValue(insertBuilder);
    }
    insertBuilder.execute.mockResolvedValue({ raw: [{ id: 'e-new' }] });
    mockQueue.scheduleCalibrationRecompute.mockResolvedValue(undefined);
  });

  describe('recordEvent', () => {
    const input = { fixtureId: 'fx-1', modelVersionId: 'v-1', pHome: 0.4, pDraw: 0.2, pAway: 0.2, outcome: MatchOutcome.HOME };
    const stored = { id: 'e-1', fixtureId: 'fx-1', modelVersionId: 'v-1', createdAt: new Date('2024-05-01T10:00:00Z') };

    it('should store normalised probabilities and schedule that day', async () => {
      mockRegistry.findById.mockResolvedValue({ id: 'v-1' });
      mockEventRepository.findOne.mockResolvedValueOnce(null).mockResolvedValueOnce(stored);

      const result = await service.recordEvent(input);

      expect(result).toEqual({ created: true, event: stored });
      expect(insertBuilder.values).toHaveBeenCalledWith({
        fixtureId: 'fx-1',
        modelVersionId: 'v-1',
        pHome: expect.closeTo(0.5, 12),
        pDraw: expect.closeTo(0.25, 12),
        pAway: expect.closeTo(0.25, 12),
        outcome: MatchOutcome.HOME,
      });
      expect(mockQueue.scheduleCalibrationRecompute).toHaveBeenCalledWith('v-1', '2024-05-01');
    });

    it('should ignore a second event for the same fixture and version', async () => {
      mockRegistry.findById.mockResolvedValue({ id: 'v-1' });
      mockEventRepository.findOne.mockResolvedValue(stored);

      const result = await service.recordEvent(input);

      expect(result.created).toBe(false);
      expect(insertBuilder.execute).not.toHaveBeenCalled();
      expect(mockQueue.scheduleCalibrationRecompute).not.toHaveBeenCalled();
    });

    it('should keep the event when the recompute cannot be scheduled', async () => {
      mockRegistry.findById.mockResolvedValue({ id: 'v-1' });
      mockEventRepository.findOne.mockResolvedValueOnce(null).mockResolvedValueOnce(stored);
      mockQueue.scheduleCalibrationRecompute.mockRejectedValue(new Error('redis unavailable'));

      await expect(service.recordEvent(input)).resolves.toEqual({ created: true, event: stored });
    });

    it('should report a row inserted first by a concurrent writer as not created', async () => {
      mockRegistry.findById.mockResolvedValue({ id: 'v-1' });
      mockEventRepository.findOne.mockResolvedValueOnce(null).mockResolvedValueOnce(stored);
      insertBuilder.execute.mockResolvedValue({ raw: [] });

      const result = await service.recordEvent(input);

      expect(result).toEqual({ created: false, event: stored });
      expect(mockQueue.scheduleCalibrationRecompute).not.toHaveBeenCalled();
    });

    it('should reject probabilities outside [0, 1]', async () => {
      await expect(service.recordEvent({ ...input, pHome: 1.5 })).rejects.toBeInstanceOf(InvalidSignalError);
      expect(mockRegistry.findById).not.toHaveBeenCalled();
    });
  });

  describe('settleFixture', () => {
    it('should record the latest surface of each version once', async () => {
      mockMarketProbabilityRepository.find.mockResolvedValue([
        { modelVersionId: 'v-1', probabilities: { HOME: 0.5, DRAW: 0.3, AWAY: 0.2 } },
        { modelVersionId: 'v-1', probabilities: { HOME: 0.1, DRAW: 0.1, AWAY: 0.8 } },
        { modelVersionId: 'v-2', probabilities: { HOME: 0.4, DRAW: 0.3, AWAY: 0.3 } },
        { modelVersionId: 'v-3', probabilities: { 'OVER_2.5': 0.6 } },
      ]);
      // v-1 is absent until inserted; v-2 was settled earlier
      const events = new Map<string, object>([['v-2', { id: 'e-2', modelVersionId: 'v-2' }]]);
      mockEventRepository.findOne.mockImplementation(async ({ where }: { where: { modelVersionId: string } }) => {
        const event = events.get(where.modelVersionId) ?? null;
        events.set(where.modelVersionId, {
          id: 'e-1',
          modelVersionId: 'v-1',
          createdAt: new Date('2024-05-01T23:30:00Z'),
        });
        return event;
      });

      const result = await service.settleFixture('fx-1', 2, 1);

      expect(result).toEqual({
        fixtureId: 'fx-1',
        outcome: MatchOutcome.HOME,
        recorded: ['v-1'],
        alreadyRecorded: ['v-2'],
        skipped: ['v-3'],
      });
      expect(insertBuilder.values).toHaveBeenCalledTimes(1);
      expect(insertBuilder.values).toHaveBeenCalledWith(
        expect.objectContaining({ fixtureId: 'fx-1', modelVersionId: 'v-1', pHome: expect.closeTo(0.5, 12), outcome: MatchOutcome.HOME }),
      );
      expect(mockQueue.scheduleCalibrationRecompute).toHaveBeenCalledTimes(1);
      expect(mockQueue.scheduleCalibrationRecompute).toHaveBeenCalledWith('v-1', '2024-05-01');
    });

    it('should count a version inserted concurrently as already recorded', async () => {
      mockMarketProbabilityRepository.find.mockResolvedValue([
        { modelVersionId: 'v-1', probabilities: { HOME: 0.5, DRAW: 0.3, AWAY: 0.2 } },
      ]);
      mockEventRepository.findOne.mockResolvedValue(null);
      insertBuilder.execute.mockResolvedValue({ raw: [] });

      const result = await service.settleFixture('fx-1', 0, 0);

      expect(result.recorded).toEqual([]);
      expect(result.alreadyRecorded).toEqual(['v-1']);
      expect(mockQueue.scheduleCalibrationRecompute).not.toHaveBeenCalled();
    });

    it('should reject a negative score', async () => {
      await expect(service.settleFixture('fx-1', -1, 0)).rejects.toBeInstanceOf(InvalidSignalError);
    });
  });

  describe('recomputeDay', () => {
    it('should upsert the totals of the day', async () => {
      mockEventRepository.find.mockResolvedValue([
        row('0.500000', '0.300000', '0.200000', MatchOutcome.HOME),
        row('0.200000', '0.300000', '0.500000', MatchOutcome.AWAY),
      ]);

      const daily = await service.recomputeDay('v-1', '2024-05-01');

      expect(mockDailyRepository.upsert).toHaveBeenCalledWith(
        expect.objectContaining({ modelVersionId: 'v-1', day: '2024-05-01', served: 2, correct: 2 }),
        ['modelVersionId', 'day'],
      );
      expect(daily).not.toBeNull();
      expect(daily?.accuracy).toBe(1);
      expect(daily?.brierSum).toBeCloseTo(0.76, 12);
      expect(daily?.brierMean).toBeCloseTo(0.38, 12);
      expect(daily?.logLossSum).toBeCloseTo(2 * Math.log(2), 12);
      expect(daily?.ece).toBeCloseTo(0.5, 12);
    });

    it('should delete the row when the day has no events', async () => {
      mockEventRepository.find.mockResolvedValue([]);

      await expect(service.recomputeDay('v-1', '2024-05-01')).resolves.toBeNull();
      expect(mockDailyRepository.delete).toHaveBeenCalledWith({ modelVersionId: 'v-1', day: '2024-05-01' });
      expect(mockDailyRepository.upsert).not.toHaveBeenCalled();
    });
  });

  describe('rollupRecentDays', () => {
    const selectBuilder = {
      select: jest.fn(),
      where: jest.fn(),
      getRawMany: jest.fn(),
    };

    beforeEach(() => {
      selectBuilder.select.mockReturnValue(selectBuilder);
      selectBuilder.where.mockReturnValue(selectBuilder);
      mockEventRepository.createQueryBuilder.mockImplementation(() => selectBuilder);
      mockEventRepository.find.mockResolvedValue([row('0.500000', '0.300000', '0.200000', MatchOutcome.HOME)]);
    });

    it('should rebuild the previous day as well as the current one', async () => {
      selectBuilder.getRawMany.mockResolvedValue([{ modelVersionId: 'v-1' }]);

      const rolledUp = await service.rollupRecentDays(new Date('2024-05-02T00:00:00Z'));

      expect(rolledUp).toBe(1);
      expect(selectBuilder.where).toHaveBeenCalledWith('e.createdAt >= :start', {
        start: new Date('2024-05-01T00:00:00.000Z'),
      });
      expect(mockDailyRepository.upsert.mock.calls.map(([values]) => [values.modelVersionId, values.day])).toEqual([
        ['v-1', '2024-05-01'],
        ['v-1', '2024-05-02'],
      ]);
    });

    it('should carry on with the next version when one fails', async () => {
      selectBuilder.getRawMany.mockResolvedValue([{ modelVersionId: 'v-1' }, { modelVersionId: 'v-2' }]);
      mockDailyRepository.upsert.mockRejectedValueOnce(new Error('deadlock detected')).mockResolvedValue({});

      const rolledUp = await service.rollupRecentDays(new Date('2024-05-02T09:00:00Z'));

      expect(rolledUp).toBe(1);
      expect(mockDailyRepository.upsert.mock.calls.map(([values]) => [values.modelVersionId, values.day])).toEqual([
        ['v-1', '2024-05-01'],
        ['v-2', '2024-05-01'],
        ['v-2', '2024-05-02'],
      ]);
    });
  });

  describe('getDailyCalibration', () => {
    it('should reject an inverted range', async () => {
      await expect(service.getDailyCalibration('v-1', '2024-05-10', '2024-05-01')).rejects.toBeInstanceOf(BadRequestException);
      expect(mockDailyRepository.find).not.toHaveBeenCalled();
    });
  });

  describe('checkGates', () => {
    it('should raise an alert per breached threshold', async () => {
      mockEventRepository.find.mockResolvedValue([
        row('0.500000', '0.300000', '0.200000', MatchOutcome.AWAY),
        row('0.600000', '0.300000', '0.100000', MatchOutcome.DRAW),
      ]);

      const result = await service.checkGates('v-1', new Date('2024-05-08T00:00:00Z'));

      expect(result.status).toBe('BREACHED');
      expect(result.served).toBe(2);
      expect(result.accuracy).toBe(0);
      expect(result.ece).toBeCloseTo(0.55, 12);
      expect(result.alerts.map(alert => alert.metric)).toEqual(['accuracy', 'ece']);
      expect(result.alerts[0].message).toBe('Accuracy 0.00% is below the 45.00% floor');
      expect(metrics.get(CALIBRATION_GATE_BREACHED, { modelVersionId: 'v-1', metric: 'accuracy' })).toBe(1);
      expect(metrics.get(CALIBRATION_GATE_BREACHED, { modelVersionId: 'v-1', metric: 'ece' })).toBe(1);
    });

    it('should pass a well calibrated window', async () => {
      mockEventRepository.find.mockResolvedValue([
        row('0.500000', '0.300000', '0.200000', MatchOutcome.HOME),
        row('0.500000', '0.300000', '0.200000', MatchOutcome.AWAY),
      ]);

      const result = await service.checkGates('v-1');

      // One hit at confidence 0.5 in the same bin: accuracy 0.5, ECE 0
      expect(result.status).toBe('PASS');
      expect(result.accuracy).toBe(0.5);
      expect(result.ece).toBeCloseTo(0, 12);
      expect(result.alerts).toEqual([]);
    });

    it('should not alert below the minimum sample count', async () => {
      mockEventRepository.find.mockResolvedValue([row('0.500000', '0.300000', '0.200000', MatchOutcome.AWAY)]);

      const result = await service.checkGates('v-1');

      expect(result.status).toBe('INSUFFICIENT_DATA');
      expect(result.alerts).toEqual([]);
      expect(metrics.total(CALIBRATION_GATE_BREACHED)).toBe(0);
    });
  });

  describe('checkModelDrift', () => {
    it('should flag a large drop in recent accuracy', async () => {
      const hit = row('0.600000', '0.200000', '0.200000', MatchOutcome.HOME);
      const miss = row('0.600000', '0.200000', '0.200000', MatchOutcome.AWAY);
      mockEventRepository.find
        .mockResolvedValueOnce([hit, hit, hit, miss])
        .mockResolvedValueOnce([hit, miss]);

      const drift = await service.checkModelDrift('v-1');

      expect(drift.isDrifting).toBe(true);
      expect(drift.severity).toBe('CRITICAL');
      expect(drift.previousAccuracy).toBe(0.75);
      expect(drift.currentAccuracy).toBe(0.5);
      expect(drift.dropPercentage).toBe(0.25);
    });

    it('should report insufficient data without events', async () => {
      mockEventRepository.find.mockResolvedValue([]);

      const drift = await service.checkModelDrift('v-1');

      expect(drift.isDrifting).toBe(false);
      expect(drift.message).toBe('Insufficient data for drift detection');
    });
  });
});
