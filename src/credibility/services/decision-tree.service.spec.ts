import { Logger } from '@nestjs/common';
import { QUESTION_BANK } from '../config/question-bank';
import { IdeologyOracle } from '../oracle/ideology-oracle';
import { ScriptedOracle } from '../oracle/scripted-oracle';
import { DecisionTreeService } from './decision-tree.service';

describe('DecisionTreeService', () => {
  const topic = QUESTION_BANK[0];
  let service: DecisionTreeService;

  beforeEach(() => {
    service = new DecisionTreeService();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('scores a not relevant topic as null without asking further', async () => {
    const oracle = new ScriptedOracle({});

    const result = await service.evaluate(topic, oracle);

    expect(result).toEqual({
      topicId: 'economic.ownership',
      dimension: 'economic',
      score: null,
      outcome: 'not-relevant',
      pole: null,
      stoppedAt: null,
    });
    expect(oracle.asked).toEqual(['economic.ownership.relevance']);
  });

  it('stops at the most extreme confirmed rung', async () => {
    const oracle = new ScriptedOracle({
      'economic.ownership': {
        relevant: true,
        stance: 'left',
        confirmed: ['economic.ownership.left.2', 'economic.ownership.left.4'],
      },
    });

    const result = await service.evaluate(topic, oracle);

    expect(result.score).toBe(-7.5);
    expect(result.outcome).toBe('rung');
    expect(result.stoppedAt).toEqual({
      pole: 'left',
      index: 1,
      questionId: 'economic.ownership.left.2',
    });
    expect(oracle.asked).toEqual([
      'economic.ownership.relevance',
      'economic.ownership.stance',
      'economic.ownership.left.1',
      'economic.ownership.left.2',
    ]);
  });

  it('never reads an extreme position as a moderate one', async () => {
    const oracle = new ScriptedOracle({
      'economic.ownership': {
        relevant: true,
        stance: 'right',
        confirmed: [
          'economic.ownership.right.1',
          'economic.ownership.right.2',
          'economic.ownership.right.3',
          'economic.ownership.right.4',
        ],
      },
    });

    const result = await service.evaluate(topic, oracle);

    expect(result.score).toBe(10);
    expect(result.pole).toBe('right');
    expect(result.stoppedAt?.citation).toBe(
      'Rothbard, M. (1973). For a New Liberty',
    );
  });

  it('returns 0 when only the centrism check is confirmed', async () => {
    const oracle = new ScriptedOracle({
      'economic.ownership': {
        relevant: true,
        stance: 'left',
        confirmed: ['economic.ownership.centrism'],
      },
    });

    const result = await service.evaluate(topic, oracle);

    expect(result.score).toBe(0);
    expect(result.outcome).toBe('centrist');
    expect(oracle.asked).toHaveLength(7);
  });

  it('falls back to the most moderate rung under weak-default', async () => {
    const oracle = new ScriptedOracle({
      'economic.ownership': { relevant: true, stance: 'right' },
    });

    const result = await service.evaluate(topic, oracle, {
      noMatchPolicy: 'weak-default',
    });

    expect(result.score).toBe(2.5);
    expect(result.outcome).toBe('weak-default');
    expect(result.stoppedAt).toBeNull();
  });

  it('excludes the topic under the exclude policy', async () => {
    const oracle = new ScriptedOracle({
      'economic.ownership': { relevant: true, stance: 'right' },
    });

    const result = await service.evaluate(topic, oracle, {
      noMatchPolicy: 'exclude',
    });

    expect(result.score).toBeNull();
    expect(result.outcome).toBe('no-signal');
    expect(result.pole).toBe('right');
  });

  it('turns an oracle error into an excluded topic', async () => {
    const oracle: IdeologyOracle = {
      relevant: jest.fn().mockResolvedValue(true),
      stance: jest.fn().mockResolvedValue('left'),
      confirms: jest.fn().mockRejectedValue(new Error('model offline')),
    };

    const result = await service.evaluate(topic, oracle);

    expect(result.score).toBeNull();
    expect(result.outcome).toBe('oracle-failure');
    expect(result.pole).toBe('left');
    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      'topic excluded: economic.ownership (model offline)',
    );
  });

  it('rejects a stance outside left and right', async () => {
    const oracle = {
      relevant: jest.fn().mockResolvedValue(true),
      stance: jest.fn().mockResolvedValue('center'),
      confirms: jest.fn(),
    };

    const result = await service.evaluate(topic, oracle as never);

    expect(result.outcome).toBe('oracle-failure');
    expect(result.pole).toBeNull();
    expect(oracle.confirms).not.toHaveBeenCalled();
    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      'topic excluded: economic.ownership (invalid stance: center)',
    );
  });

  it('asks nothing once the signal is aborted', async () => {
    const oracle = new ScriptedOracle({
      'economic.ownership': { relevant: true, stance: 'left' },
    });
    const controller = new AbortController();
    controller.abort();

    const result = await service.evaluate(topic, oracle, {
      signal: controller.signal,
    });

    expect(result.outcome).toBe('oracle-failure');
    expect(oracle.asked).toEqual([]);
  });

  it('returns frozen results', async () => {
    const result = await service.evaluate(topic, new ScriptedOracle({}));

    expect(Object.isFrozen(result)).toBe(true);
  });
});
