import type {
  ContainerRecord,
  LocationRecord,
  PlantRecord,
  TableSnapshot,
} from "~/types/records";

export function gardenPlants(): PlantRecord[] {
  return [
    { ID: "1", "Plant Name": "Vinca", "Light Requirements": "Full Sun" },
    { ID: "2", "Plant Name": "Trailing Vinca", "Light Requirements": "Full Sun" },
    { ID: "3", "Plant Name": "Hostas", "Light Requirements": "Shade" },
    { ID: "4", "Plant Name": "Basil", "Light Requirements": "Full Sun" },
    { ID: "10", "Plant Name": "Rosemary", "Light Requirements": "Full Sun" },
  ];
}

export function gardenLocations(): LocationRecord[] {
  return [
    {
      location_id: "L1",
      location_name: "Patio",
      morning_sun_hours: "2",
      afternoon_sun_hours: "5",
      evening_sun_hours: "1",
      total_sun_hours: "",
      shade_pattern: "Afternoon sun",
      microclimate_conditions: "South facing",
    },
    {
      location_id: "L2",
      location_name: "Front Porch",
      morning_sun_hours: "3",
      afternoon_sun_hours: "0",
      evening_sun_hours: "0",
      total_sun_hours: "3",
      shade_pattern: "Morning sun",
      microclimate_conditions: "North side",
    },
    {
      location_id: "L3",
      location_name: "Back Patio Bed",
      morning_sun_hours: 4,
      afternoon_sun_hours: 4,
      evening_sun_hours: 2,
      total_sun_hours: 10,
      shade_pattern: "Full sun",
      microclimate_conditions: "Open",
    },
  ];
}

export function gardenContainers(): ContainerRecord[] {
  return [
    {
      container_id: "C1",
      plant_id: "1",
      location_id: "L1",
      container_type: "Pot",
      container_size: "Small",
      container_material: "Plastic",
    },
    {
      container_id: "C2",
      plant_id: "2",
      location_id: "L2",
      container_type: "Hanging Basket",
      container_size: "Medium",
      container_material: "Plastic",
    },
    {
      container_id: "C3",
      plant_id: "3",
      location_id: "L3",
      container_type: "Pot",
      container_size: "Small",
      container_material: "Ceramic",
    },
    {
      container_id: "C4",
      plant_id: "10",
      location_id: "L1",
      container_type: "Window Box",
      container_size: "Large",
      container_material: "Wood",
    },
    {
      container_id: "C5",
      plant_id: "1",
      location_id: "L2",
      container_type: "Pot",
      container_size: "Large",
      container_material: "Terracotta",
    },
  ];
}

export function gardenSnapshot(): TableSnapshot {
  return {
    plants: gardenPlants(),
    locations: gardenLocations(),
    containers: gardenContainers(),
  };
}
