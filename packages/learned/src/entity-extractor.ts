import {
  createFieldMap,
  type ConfidenceWeights,
  type DocumentText,
  type EntityLabel,
  type EntityRecognizer,
  type FieldMapInput,
  type LearnedExtraction,
  type LearnedExtractor,
  type RecognizedEntity,
} from '@fieldwise/contracts';
import { DEFAULT_CONFIDENCE_WEIGHTS, calculateConfidence } from '@fieldwise/kernel';
import { createSafeLogger, currencyOf, isValidEmail, normalizeAmount, type Logger } from '@fieldwise/shared';

const ENTITY_LABELS: readonly EntityLabel[] = ['ORG', 'PERSON', 'MONEY', 'GPE', 'EMAIL'];

export interface EntityLearnedExtractorOptions {
  recognizer: EntityRecognizer;

  /**
   * Weights used to score the learned field map; pass the parser's
   * weights so both sides are comparable
   */
  weights?: ConfidenceWeights;

  logger?: Logger;
}

type EntityTexts = Record<EntityLabel, string[]>;

const isEntityLabel = (label: string): label is EntityLabel => ENTITY_LABELS.some((known) => known === label);

/**
 * Entity texts grouped by label, in document order. Unknown labels and
 * blank spans are dropped.
 */
export function groupEntities(entities: readonly RecognizedEntity[]): EntityTexts {
  const groups: EntityTexts = { ORG: [], PERSON: [], MONEY: [], GPE: [], EMAIL: [] };
  for (const entity of entities) {
    const text = entity.text.trim();
    if (isEntityLabel(entity.label) && text.length > 0) {
      groups[entity.label].push(text);
    }
  }
  return groups;
}

/**
 * Map grouped entities onto invoice fields: organizations give the
 * parties, a person stands in for a missing second organization, the first
 * money span gives amount and currency, places give the addresses.
 */
export function entitiesToFields(groups: EntityTexts): FieldMapInput {
  const [money] = groups.MONEY;
  const currency = money !== undefined ? currencyOf(money) : undefined;
  const amount = money !== undefined ? normalizeAmount(money, { currency }) : undefined;
  const emails = groups.EMAIL.filter(isValidEmail);

  return {
    sender: groups.ORG[0],
    recipient: groups.ORG[1] ?? groups.PERSON[0],
    amount: amount?.valid === true ? amount.normalized : undefined,
    currency,
    sender_address: groups.GPE[0],
    recipient_address: groups.GPE[1],
    sender_email: emails[0],
    recipient_email: emails[1],
  };
}

/**
 * Learned fallback backed by a named-entity recognizer supplied by the
 * host application.
 *
 * Recognizer errors propagate; the pipeline turns them into a `failed`
 * learned status.
 */
export class EntityLearnedExtractor implements LearnedExtractor {
  readonly id: string;

  private readonly recognizer: EntityRecognizer;
  private readonly weights: ConfidenceWeights;
  private readonly logger: Logger;

  constructor(options: EntityLearnedExtractorOptions) {
    this.recognizer = options.recognizer;
    this.id = `entity:${options.recognizer.id}`;
    this.weights = options.weights ?? DEFAULT_CONFIDENCE_WEIGHTS;
    this.logger = options.logger ?? createSafeLogger({ prefix: 'fieldwise:learned' });
  }

  isAvailable(): boolean {
    return true;
  }

  async extract(doc: DocumentText): Promise<LearnedExtraction> {
    const groups = groupEntities(await this.recognizer.recognize(doc.text));
    const fieldMap = createFieldMap(entitiesToFields(groups));
    const confidence = calculateConfidence(fieldMap, this.weights);

    this.logger.debug('Entities recognized', {
      recognizerId: this.recognizer.id,
      organizations: groups.ORG.length,
      persons: groups.PERSON.length,
      amounts: groups.MONEY.length,
      places: groups.GPE.length,
      confidence,
    });

    return { fieldMap, confidence };
  }
}
