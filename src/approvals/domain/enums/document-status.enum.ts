export enum DocumentStatus {
  DRAFT = 'draft', // Editable by the author, no review cycle open
  REVIEW = 'review', // Current cycle awaiting reviewer decisions
  APPROVED = 'approved', // Every required reviewer approved (locked)
  REJECTED = 'rejected', // A reviewer rejected; may be resubmitted
}
