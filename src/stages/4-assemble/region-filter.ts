/**
 * Gene-region filter for annotation files.
 *
 * Builds an awk invocation that keeps the GTF records whose attribute column
 * names the configured gene. The gene ID is passed with `-v`, never spliced
 * into the program text.
 */

/**
 * awk program matching `gene_id "<gene>"` in column 9 of a tab-separated GTF.
 * Comment lines have no ninth column and never match.
 */
export const GENE_FILTER_PROGRAM = 'index($9, "gene_id \\"" gene "\\"") > 0';

/**
 * Argument vector that prints the records of `geneId` from `annotation`.
 */
export function regionFilterArgv(
  awk: string,
  geneId: string,
  annotation: string,
): string[] {
  return [awk, "-F", "\t", "-v", `gene=${geneId}`, GENE_FILTER_PROGRAM, annotation];
}
