export type InitialisationStatus =
  | 'created'
  | 'database-exists'
  | 'user-exists';

export interface InitialisationOutcome {
  readonly status: InitialisationStatus;
  readonly database: string;
  readonly user: string;
}

/** MongoServerError code for "User ... already exists". */
export const USER_ALREADY_EXISTS_CODE = 51003;
