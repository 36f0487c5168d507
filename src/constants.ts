/**
 * Type of a chat a message was sent from.
 */
export enum ChatType {
  User = 'User',
  Group = 'Group',
  System = 'System',
  Unknown = 'Unknown'
}
