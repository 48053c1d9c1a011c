export interface SourceCitation {
  file: string;
  lineStart: number;
  lineEnd: number;
  relevance: number;
  snippet: string;
}

export interface Question {
  id: number;
  repositoryId: number;
  questionText: string;
  answerText: string | null;
  confidenceScore: number | null;
  sources: SourceCitation[];
  modelUsed: string | null;
  processingTimeMs: number | null;
  createdAt: Date;
}

export type NewQuestion = Omit<Question, 'id' | 'createdAt'>;

export interface QuestionUsage {
  totalQuestions: number;
  averageResponseTimeMs: number | null;
}
