import { BadRequestException, NotFoundException } from '@nestjs/common';
import { CredibilityController } from './credibility.controller';
import { QuestionBankService } from './services/question-bank.service';

function makeBody(overrides: Record<string, unknown> = {}): unknown {
  return {
    outlet: 'Example Daily',
    ideology: {
      answers: {
        'economic.ownership': {
          relevant: true,
          stance: 'left',
          confirmed: ['economic.ownership.left.4'],
        },
      },
    },
    bias: { newsReportingBalance: -1.8, editorialBias: null },
    factuality: {
      factCheck: 1,
      sourcing: 1.5,
      transparency: 0,
      propaganda: 3,
    },
    traffic: 'High',
    siteAgeYears: '25',
    freedom: 'Free',
    ...overrides,
  };
}

const INVALID_REQUESTS: [string, Record<string, unknown>][] = [
  [
    'an unknown topic',
    { ideology: { answers: { 'economic.nope': { relevant: true } } } },
  ],
  [
    'an unknown question',
    {
      ideology: {
        answers: {
          'economic.ownership': { relevant: true, confirmed: ['x.left.1'] },
        },
      },
    },
  ],
  [
    'a question from another topic',
    {
      ideology: {
        answers: {
          'economic.labor': {
            relevant: true,
            stance: 'left',
            confirmed: ['social.guns.left.1'],
          },
        },
      },
    },
  ],
  ['a missing ideology source', { ideology: {} }],
  ['a non-numeric signal', { bias: { newsReportingBalance: 'left' } }],
  ['an unknown traffic tier', { traffic: 'Huge' }],
  ['a negative timeout', { timeoutMs: -1 }],
  ['an empty outlet', { outlet: ' ' }],
];

describe('CredibilityController', () => {
  const report = { outlet: 'Example Daily' };
  const oracle = { relevant: jest.fn(), stance: jest.fn(), confirms: jest.fn() };
  const oracleFactory = {
    scripted: jest.fn().mockReturnValue(oracle),
    fromArticles: jest.fn().mockReturnValue(oracle),
  };
  const assembler = {
    assemble: jest.fn().mockResolvedValue(report),
  };
  const storage = {
    save: jest.fn().mockResolvedValue(undefined),
    load: jest.fn(),
  };
  const evaluation = {
    evaluate: jest.fn().mockReturnValue({ total: 0 }),
  };
  const controller = new CredibilityController(
    new QuestionBankService(),
    oracleFactory as never,
    assembler as never,
    storage as never,
    evaluation as never,
  );

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('lists the question bank topics', () => {
    const topics = controller.getTopics();

    expect(topics).toHaveLength(14);
    expect(topics[0]).toEqual({
      id: 'economic.ownership',
      dimension: 'economic',
      title: 'Property and the means of production',
      questionCount: 10,
    });
  });

  it('parses a report request with scripted answers', async () => {
    await expect(controller.createReport(makeBody())).resolves.toBe(report);

    expect(oracleFactory.scripted).toHaveBeenCalledWith({
      'economic.ownership': {
        relevant: true,
        stance: 'left',
        confirmed: ['economic.ownership.left.4'],
      },
    });
    expect(assembler.assemble).toHaveBeenCalledWith({
      outlet: 'Example Daily',
      oracle,
      editorial: { newsReportingBalance: -1.8, editorialBias: null },
      factuality: {
        factCheck: 1,
        sourcing: 1.5,
        transparency: 0,
        propaganda: 3,
      },
      auxiliary: { trafficTier: 'High', siteAgeYears: 25, freedomTier: 'Free' },
      timeoutMs: undefined,
      noMatchPolicy: undefined,
    });
    expect(storage.save).not.toHaveBeenCalled();
  });

  it('builds an article oracle and saves under the domain', async () => {
    await controller.createReport(
      makeBody({
        domain: 'example.com',
        ideology: { articles: [{ title: 'Tariffs rise', text: 'Trade news.' }] },
        timeoutMs: 5000,
      }),
    );

    expect(oracleFactory.fromArticles).toHaveBeenCalledWith([
      { title: 'Tariffs rise', text: 'Trade news.' },
    ]);
    expect(storage.save).toHaveBeenCalledWith('example.com', report);
    expect(assembler.assemble.mock.calls[0][0].timeoutMs).toBe(5000);
  });

  it.each(INVALID_REQUESTS)('rejects %s', async (_case, overrides) => {
    await expect(
      controller.createReport(makeBody(overrides)),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(assembler.assemble).not.toHaveBeenCalled();
  });

  it('names the topic a foreign question was sent under', async () => {
    const body = makeBody({
      ideology: {
        answers: {
          'economic.labor': {
            relevant: true,
            confirmed: ['social.guns.left.1'],
          },
        },
      },
    });

    await expect(controller.createReport(body)).rejects.toThrow(
      'question social.guns.left.1 does not belong to economic.labor',
    );
  });

  it('returns 404 when no current report is stored', async () => {
    storage.load.mockResolvedValue(null);

    await expect(controller.getReport('example.com')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('passes parsed evaluation entries through', () => {
    controller.evaluate([
      {
        name: 'alpha',
        predicted: { bias: 'Left', factuality: '' },
        reference: { bias: 'LEFT', factuality: 'HIGH' },
      },
    ]);

    expect(evaluation.evaluate).toHaveBeenCalledWith([
      {
        name: 'alpha',
        predicted: { bias: 'Left', factuality: null },
        reference: { bias: 'LEFT', factuality: 'HIGH' },
      },
    ]);
  });

  it('rejects evaluation without entries', () => {
    expect(() => controller.evaluate(undefined)).toThrow(BadRequestException);
  });
});
