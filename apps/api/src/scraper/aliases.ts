// Curated names that machine translation tends to get wrong.

export const STATION_ALIASES: Readonly<Record<string, string>> = {
  駒沢大学: 'Komazawa-Daigaku',
  南新宿: 'Minami-Shinjuku',
  代々木: 'Yoyogi'
};

// Tokyo special wards, keyed without the 区 suffix.
export const AREA_ALIASES: Readonly<Record<string, string>> = {
  世田谷: 'Setagaya',
  渋谷: 'Shibuya',
  港: 'Minato',
  新宿: 'Shinjuku',
  目黒: 'Meguro',
  品川: 'Shinagawa',
  中野: 'Nakano',
  杉並: 'Suginami',
  大田: 'Ota',
  中央: 'Chuo',
  千代田: 'Chiyoda',
  文京: 'Bunkyo',
  台東: 'Taito',
  豊島: 'Toshima',
  北: 'Kita',
  荒川: 'Arakawa',
  板橋: 'Itabashi',
  練馬: 'Nerima',
  足立: 'Adachi',
  葛飾: 'Katsushika',
  江戸川: 'Edogawa'
};

export function lookupAlias(aliases: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.hasOwn(aliases, key) ? aliases[key] : undefined;
}
