import { QuestionBankConfigError } from '../errors/credibility.errors';
import {
  Dimension,
  IdeologyQuestion,
  IdeologyTopic,
  Pole,
} from '../types/credibility.types';
import topicsData from './topics.json';

export const LADDER_LENGTH = 4;
export const LEFT_LADDER_SCORES = [-10, -7.5, -5, -2.5];
export const RIGHT_LADDER_SCORES = [10, 7.5, 5, 2.5];
export const TOPICS_PER_DIMENSION = 7;

const DIMENSIONS: Dimension[] = ['economic', 'social'];

/**
 * Builds typed topics from the raw topics file and enforces the ladder
 * invariants: four rungs per pole at the fixed scores, extreme first, and
 * every id unique.
 */
export function buildQuestionBank(raw: unknown): IdeologyTopic[] {
  const root = asRecord(raw);
  if (!root || !Array.isArray(root.topics)) {
    throw new QuestionBankConfigError(
      'question bank must contain a topics array',
    );
  }

  const seenIds = new Set<string>();
  const topics = root.topics.map((entry, index) => {
    const topic = buildTopic(entry, index);
    const ids = [
      topic.id,
      topic.relevanceCheck.id,
      topic.centrismCheck.id,
      ...topic.leftLadder.map((question) => question.id),
      ...topic.rightLadder.map((question) => question.id),
    ];
    for (const id of ids) {
      if (seenIds.has(id)) {
        throw new QuestionBankConfigError(`duplicate question bank id: ${id}`);
      }
      seenIds.add(id);
    }
    return topic;
  });

  if (topics.length === 0) {
    throw new QuestionBankConfigError('question bank has no topics');
  }
  return topics;
}

export const QUESTION_BANK: IdeologyTopic[] =
  buildQuestionBank(topicsData);

function buildTopic(entry: unknown, index: number): IdeologyTopic {
  const record = asRecord(entry);
  const id = asString(record?.id);
  if (!record || !id) {
    throw new QuestionBankConfigError(`topic #${index} has no id`);
  }

  const dimension = DIMENSIONS.find((value) => value === record.dimension);
  if (!dimension) {
    throw new QuestionBankConfigError(
      `topic ${id} has unknown dimension: ${String(record.dimension)}`,
    );
  }

  const relevance = asString(record.relevance);
  const centrism = asString(record.centrism);
  if (!relevance || !centrism) {
    throw new QuestionBankConfigError(
      `topic ${id} needs relevance and centrism prompts`,
    );
  }

  const keywords = Array.isArray(record.keywords)
    ? record.keywords.filter(
        (keyword): keyword is string =>
          typeof keyword === 'string' && keyword.trim().length > 0,
      )
    : [];

  return {
    id,
    dimension,
    title: asString(record.title) || id,
    keywords,
    relevanceCheck: { id: `${id}.relevance`, topicId: id, text: relevance },
    leftLadder: buildLadder(id, 'left', record.left),
    rightLadder: buildLadder(id, 'right', record.right),
    centrismCheck: {
      id: `${id}.centrism`,
      topicId: id,
      text: centrism,
      score: 0,
    },
  };
}

function buildLadder(
  topicId: string,
  pole: Pole,
  raw: unknown,
): IdeologyQuestion[] {
  if (!Array.isArray(raw) || raw.length !== LADDER_LENGTH) {
    throw new QuestionBankConfigError(
      `topic ${topicId} ${pole} ladder must have exactly ${LADDER_LENGTH} rungs`,
    );
  }

  const ladder = raw.map((item, index): IdeologyQuestion => {
    const record = asRecord(item);
    const text = asString(record?.text);
    const score = record?.score;
    if (!text || typeof score !== 'number' || !Number.isFinite(score)) {
      throw new QuestionBankConfigError(
        `topic ${topicId} ${pole} rung ${index + 1} needs text and a numeric score`,
      );
    }
    const citation = asString(record?.citation);
    return {
      id: `${topicId}.${pole}.${index + 1}`,
      topicId,
      text,
      score,
      ...(citation ? { citation } : {}),
    };
  });

  // Extreme first, at the fixed rung scores.
  const expected = pole === 'left' ? LEFT_LADDER_SCORES : RIGHT_LADDER_SCORES;
  ladder.forEach((question, i) => {
    if (question.score !== expected[i]) {
      throw new QuestionBankConfigError(
        `topic ${topicId} ${pole} rung ${i + 1} score ${question.score} must be ${expected[i]}`,
      );
    }
  });

  return ladder;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}
