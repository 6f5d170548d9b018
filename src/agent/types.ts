export interface PromptBundle {
  system: string;
  /** Where `system` came from: a file path, or 'default' */
  source: string;
  restaurantInfo: RestaurantInfo;
}

/** Free-form facts about the venue, loaded from config/restaurant-info.json */
export type RestaurantInfo = Record<string, unknown>;

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}
