export interface PaperRecord {
  PubmedID: string;
  Title: string;
  PublicationDate: string;
  NonAcademicAuthors: string;
  CompanyAffiliations: string;
  CorrespondingAuthorEmail: string;
}

export interface PipelineResult {
  query: string;
  outputPath: string;
  records: PaperRecord[];
}
