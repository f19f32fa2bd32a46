export type ActorType = 'person' | 'issuer' | 'admin';

/**
 * The principal behind a request.
 * `id` is the person id, issuing entity id or admin user id respectively.
 */
export interface Actor {
  type: ActorType;
  id: number;
}
