// Represents a floor of the building served by the car
export type FloorNumber = number;
