export enum RoomType {
  Single = 'Single',
  Double = 'Double',
  Queen = 'Queen',
  Twin = 'Twin',
  Suite = 'Suite',
}
