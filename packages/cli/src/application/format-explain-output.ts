import type {
  AuthorScore,
  AuthorScoreTrace,
  CriterionTrace,
  QualityDimension,
} from "@gitgrade/core";
import type { ExplainFormat, ExplainResult } from "./run-explain-command.js";

const DIMENSIONS: readonly QualityDimension[] = ["commitBehavior", "qualityAndScope", "activity"];

const criterionLabel = (criterion: CriterionTrace): string =>
  criterion.criterionId.slice(criterion.dimension.length + 1);

const criteriaOf = (
  author: AuthorScoreTrace,
  dimension: QualityDimension,
): readonly CriterionTrace[] => author.criteria.filter((criterion) => criterion.dimension === dimension);

const dimensionScore = (
  author: AuthorScoreTrace,
  score: AuthorScore | undefined,
  dimension: QualityDimension,
): number =>
  score?.scores[dimension] ??
  criteriaOf(author, dimension).reduce((sum, criterion) => sum + criterion.points, 0);

/** Criteria furthest from their maximum, largest gap first. */
export const biggestGaps = (author: AuthorScoreTrace, limit = 3): readonly CriterionTrace[] =>
  author.criteria
    .filter((criterion) => criterion.points < criterion.maxPoints)
    .sort(
      (a, b) =>
        b.maxPoints - b.points - (a.maxPoints - a.points) || a.criterionId.localeCompare(b.criterionId),
    )
    .slice(0, limit);

const formatGaps = (author: AuthorScoreTrace): string =>
  biggestGaps(author)
    .map((criterion) => `${criterion.criterionId} (+${criterion.maxPoints - criterion.points})`)
    .join(", ") || "none";

const findScore = (payload: ExplainResult, author: string): AuthorScore | undefined =>
  payload.summary.quality.rankedAuthors.find((score) => score.author === author);

const renderAuthorText = (payload: ExplainResult, author: AuthorScoreTrace): string => {
  const score = findScore(payload, author.author);
  const lines: string[] = [];
  lines.push(`author: ${author.author}`);
  lines.push(`  total: ${author.totalScore} (grade ${author.grade})`);
  for (const dimension of DIMENSIONS) {
    lines.push(`  ${dimension}: ${dimensionScore(author, score, dimension)}`);
    for (const criterion of criteriaOf(author, dimension)) {
      lines.push(
        `    - ${criterionLabel(criterion)}: value=${criterion.value} points=${criterion.points}/${criterion.maxPoints}`,
      );
    }
  }
  lines.push(`  biggest gaps: ${formatGaps(author)}`);
  return lines.join("\n");
};

const renderText = (payload: ExplainResult): string => {
  const lines: string[] = [];
  lines.push(`target: ${payload.summary.history.targetPath}`);
  lines.push(`revision: ${payload.summary.history.range.revision}`);
  lines.push(`authors: ${payload.trace.authors.length}`);
  lines.push(`selectedAuthors: ${payload.selectedAuthors.length}`);
  lines.push("");

  for (const author of payload.selectedAuthors) {
    lines.push(renderAuthorText(payload, author));
    lines.push("");
  }

  return lines.join("\n").trimEnd();
};

const renderMarkdown = (payload: ExplainResult): string => {
  const lines: string[] = [];
  lines.push("# gitgrade Explanation");
  lines.push(`- target: \`${payload.summary.history.targetPath}\``);
  lines.push(`- revision: \`${payload.summary.history.range.revision}\``);
  lines.push(`- selectedAuthors: \`${payload.selectedAuthors.length}\``);
  lines.push("");

  for (const author of payload.selectedAuthors) {
    const score = findScore(payload, author.author);
    lines.push(`## ${author.author}`);
    lines.push(`- total: \`${author.totalScore}\` (grade \`${author.grade}\`)`);
    for (const dimension of DIMENSIONS) {
      lines.push(`- ${dimension}: \`${dimensionScore(author, score, dimension)}\``);
      for (const criterion of criteriaOf(author, dimension)) {
        lines.push(
          `  - \`${criterionLabel(criterion)}\` value=\`${criterion.value}\` points=\`${criterion.points}/${criterion.maxPoints}\``,
        );
      }
    }
    lines.push(`- biggest gaps: ${formatGaps(author)}`);
    lines.push("");
  }

  return lines.join("\n").trimEnd();
};

export const formatExplainOutput = (payload: ExplainResult, format: ExplainFormat): string => {
  if (format === "json") {
    return JSON.stringify(payload, null, 2);
  }

  if (format === "md") {
    return renderMarkdown(payload);
  }

  return renderText(payload);
};
