import { GRADES, type AuthorReportItem, type GitGradeReport } from "./domain.js";

const renderTextAuthor = (item: AuthorReportItem): string[] => [
  `  ${item.rank}. ${item.author} | grade=${item.grade} | total=${item.totalScore}`,
  `     scores: commitBehavior=${item.scores.commitBehavior} qualityAndScope=${item.scores.qualityAndScope} activity=${item.scores.activity}`,
  `     commits=${item.keyMetrics.totalCommits} files=${item.keyMetrics.filesModified} activeDays=${item.keyMetrics.activeDays} rework=${item.keyMetrics.rapidReworkRatio}% contribution=${item.keyMetrics.contributionRatio}%`,
  `     ${item.gradeDescription}`,
];

export const renderTextReport = (report: GitGradeReport): string => {
  const lines: string[] = [];
  lines.push("Repository Summary");
  lines.push(`  target: ${report.repository.targetPath}`);
  lines.push(`  revision: ${report.repository.revision}`);
  lines.push(`  commits: ${report.repository.totalCommits}`);
  lines.push(`  authors: ${report.repository.totalAuthors}`);
  lines.push(`  filesChanged: ${report.repository.totalFilesChanged}`);
  lines.push(`  insertions: ${report.repository.totalInsertions}`);
  lines.push(`  deletions: ${report.repository.totalDeletions}`);
  lines.push(`  codeChanges: ${report.repository.codeChangeMode}`);
  lines.push(`  averageScore: ${report.repository.averageScore}`);

  lines.push("");
  lines.push("Author Ranking");
  if (report.authors.length === 0) {
    lines.push("  none");
  }
  for (const item of report.authors) {
    lines.push(...renderTextAuthor(item));
  }

  lines.push("");
  lines.push("Grade Distribution");
  lines.push(`  ${GRADES.map((grade) => `${grade}=${report.gradeDistribution[grade]}`).join(" ")}`);

  lines.push("");
  lines.push("Change Frequency");
  lines.push(`  low (1-5): ${report.changeDistribution.low}`);
  lines.push(`  medium (6-15): ${report.changeDistribution.medium}`);
  lines.push(`  high (16-30): ${report.changeDistribution.high}`);
  lines.push(`  veryHigh (>30): ${report.changeDistribution.veryHigh}`);

  lines.push("");
  lines.push("Top Changed Files");
  if (report.topChangedFiles.length === 0) {
    lines.push("  none");
  }
  for (const file of report.topChangedFiles) {
    lines.push(`  - ${file.filePath} | changes=${file.changes}`);
  }
  lines.push(`  hotspots: ${report.hotspotFiles.join(", ") || "none"}`);

  return lines.join("\n");
};

const escapeCell = (value: string): string => value.replaceAll("|", "\\|");

export const renderMarkdownReport = (report: GitGradeReport): string => {
  const lines: string[] = [];
  lines.push("# gitgrade Report");
  lines.push("");
  lines.push("## Repository Summary");
  lines.push(`- target: \`${report.repository.targetPath}\``);
  lines.push(`- revision: \`${report.repository.revision}\``);
  lines.push(`- commits: \`${report.repository.totalCommits}\``);
  lines.push(`- authors: \`${report.repository.totalAuthors}\``);
  lines.push(`- files changed: \`${report.repository.totalFilesChanged}\``);
  lines.push(`- insertions / deletions: \`${report.repository.totalInsertions}\` / \`${report.repository.totalDeletions}\``);
  lines.push(`- code changes: \`${report.repository.codeChangeMode}\``);
  lines.push(`- average score: \`${report.repository.averageScore}\``);

  lines.push("");
  lines.push("## Author Ranking");
  if (report.authors.length === 0) {
    lines.push("- none");
  } else {
    lines.push("| Rank | Author | Grade | Total | Commit Behavior | Quality & Scope | Activity |");
    lines.push("|---:|---|:---:|---:|---:|---:|---:|");
    for (const item of report.authors) {
      lines.push(
        `| ${item.rank} | ${escapeCell(item.author)} | ${item.grade} | ${item.totalScore} | ${item.scores.commitBehavior} | ${item.scores.qualityAndScope} | ${item.scores.activity} |`,
      );
    }
  }

  lines.push("");
  lines.push("## Grade Distribution");
  for (const grade of GRADES) {
    lines.push(`- ${grade}: \`${report.gradeDistribution[grade]}\``);
  }

  lines.push("");
  lines.push("## Change Frequency");
  lines.push(`- 1-5 changes: \`${report.changeDistribution.low}\``);
  lines.push(`- 6-15 changes: \`${report.changeDistribution.medium}\``);
  lines.push(`- 16-30 changes: \`${report.changeDistribution.high}\``);
  lines.push(`- more than 30 changes: \`${report.changeDistribution.veryHigh}\``);

  lines.push("");
  lines.push("## Top Changed Files");
  if (report.topChangedFiles.length === 0) {
    lines.push("- none");
  }
  for (const file of report.topChangedFiles) {
    lines.push(`- \`${file.filePath}\`: ${file.changes}`);
  }
  lines.push(`- hotspots: ${report.hotspotFiles.map((file) => `\`${file}\``).join(", ") || "none"}`);

  return lines.join("\n");
};
