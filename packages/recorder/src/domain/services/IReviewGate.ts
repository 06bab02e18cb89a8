/**
 * IReviewGate - 録画後のレビュー（採用／撮り直し）インターフェース
 */
export interface IReviewGate {
  /**
   * @returns true は保持、false は削除
   */
  review(outputPath: string): Promise<boolean>;
}
