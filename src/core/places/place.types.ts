export type PlaceConfig = Readonly<{
  name: string;
  url: string;
  outputName: string;
}>;

export type Coordinates = Readonly<{
  latitude: number;
  longitude: number;
}>;
