export interface Job {
  id: string;
  jobTitle: string;
  company: string;
  localNumber?: string;
  classification?: string;
  constructionType?: string;
  hourlyRate?: number;
  distanceMiles?: number;
  tags: string[];
  postedAt?: Date;
}
