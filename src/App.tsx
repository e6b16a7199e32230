import { useState, useEffect } from 'react';
import {
  CloudSun,
  Thermometer,
  ThermometerSnowflake,
  Sprout,
  Droplets,
  MapPin,
  CalendarDays,
  Info,
  Database as DbIcon,
  TriangleAlert
} from 'lucide-react';
import { motion, AnimatePresence } from 'motion/react';
import ForecastMap from './components/ForecastMap';
import { ALL_LOCATIONS } from './constants';
import type { ForecastsResponse, LocationsResponse, StatusResponse } from './types';

export default function App() {
  // ---- Application State ---------------------------------------------------

  /** Ingestion outcome, fetched once on mount. */
  const [status, setStatus] = useState<StatusResponse | null>(null);
  /** Selector choices and the synthetic date window. */
  const [catalog, setCatalog] = useState<LocationsResponse | null>(null);
  const [startDate, setStartDate] = useState('');
  const [endDate, setEndDate] = useState('');
  const [location, setLocation] = useState(ALL_LOCATIONS);
  /** Show growing degree days and the simulated humidity index. */
  const [showExtended, setShowExtended] = useState(false);
  const [forecasts, setForecasts] = useState<ForecastsResponse | null>(null);
  const [error, setError] = useState<string | null>(null);

  // ---- Data Fetching -------------------------------------------------------

  /** Load ingest status and location choices once, then seed the date inputs. */
  useEffect(() => {
    Promise.all([fetch('/api/status'), fetch('/api/locations')])
      .then(async ([statusRes, locationsRes]) => {
        if (!statusRes.ok) throw new Error(`Status API returned ${statusRes.status}`);
        if (!locationsRes.ok) throw new Error(`Locations API returned ${locationsRes.status}`);
        const statusData: StatusResponse = await statusRes.json();
        const locationsData: LocationsResponse = await locationsRes.json();
        setStatus(statusData);
        setCatalog(locationsData);
        if (locationsData.state === 'ready') {
          setStartDate(locationsData.dateWindow.start);
          setEndDate(locationsData.dateWindow.end);
        }
      })
      .catch(err => {
        console.error('Failed to load dashboard:', err);
        setError('Could not reach the forecast service.');
      });
  }, []);

  /** Re-query whenever a filter changes; a newer request supersedes the last. */
  useEffect(() => {
    if (catalog?.state !== 'ready' || !startDate || !endDate) return;
    setForecasts(null);
    const controller = new AbortController();
    const params = new URLSearchParams({ start: startDate, end: endDate, location });
    fetch(`/api/forecasts?${params}`, { signal: controller.signal })
      .then(async res => {
        if (!res.ok) {
          const body: { error?: string } = await res.json().catch(() => ({}));
          throw new Error(body.error || `Forecasts API returned ${res.status}`);
        }
        const data: ForecastsResponse = await res.json();
        setForecasts(data);
        setError(null);
      })
      .catch(err => {
        if (err.name === 'AbortError') return;
        console.error('Failed to fetch forecasts:', err);
        setError(err instanceof Error ? err.message : 'Failed to fetch forecasts');
      });
    return () => controller.abort();
  }, [catalog, startDate, endDate, location]);

  // ---- Render ---------------------------------------------------------------

  const waitingForData = catalog?.state === 'empty-store';
  const ingestFailure = status?.ingest.state === 'failed' ? status.ingest : null;

  return (
    <div className="min-h-screen bg-[#F8F9FA] text-slate-900 font-sans">
      {/* Navigation */}
      <nav className="bg-white border-b border-slate-200 sticky top-0 z-[1000]">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
          <div className="flex justify-between h-16 items-center">
            <div className="flex items-center gap-2">
              <div className="bg-emerald-600 p-2 rounded-lg">
                <CloudSun className="text-white w-6 h-6" />
              </div>
              <span className="text-xl font-bold tracking-tight text-slate-800">Agri Forecast</span>
            </div>
            {status && (
              <span className="flex items-center gap-2 text-xs font-medium text-slate-500">
                <DbIcon className="w-4 h-4" /> {status.storedRows} stored rows
              </span>
            )}
          </div>
        </div>
      </nav>

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8 space-y-8">
        {error && (
          <div className="p-4 rounded-2xl bg-red-50 border border-red-100 text-sm text-red-700 flex items-center gap-3">
            <TriangleAlert className="w-5 h-5 shrink-0" /> {error}
          </div>
        )}

        <AnimatePresence mode="wait">
          {waitingForData ? (
            <motion.div
              key="waiting"
              initial={{ opacity: 0, y: 20 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0, y: -20 }}
              className="bg-white rounded-[2.5rem] p-10 shadow-sm border border-slate-100 text-center"
            >
              <h2 className="text-2xl font-black text-slate-800">Waiting for data</h2>
              <p className="text-sm text-slate-500 mt-2">
                {ingestFailure
                  ? `Ingestion failed (${ingestFailure.code}): ${ingestFailure.message}`
                  : 'No forecast rows have been ingested yet.'}
              </p>
            </motion.div>
          ) : catalog?.state === 'ready' ? (
            <motion.div
              key="dashboard"
              initial={{ opacity: 0, y: 20 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0, y: -20 }}
              className="space-y-8"
            >
              {/* Filters */}
              <div className="bg-white rounded-2xl p-6 shadow-sm border border-slate-100 flex flex-col md:flex-row gap-4 md:items-end">
                <label className="flex flex-col gap-1 text-xs font-bold text-slate-400 uppercase tracking-widest">
                  <span className="flex items-center gap-1"><CalendarDays className="w-3.5 h-3.5" /> From</span>
                  <input
                    type="date"
                    value={startDate}
                    onChange={e => setStartDate(e.target.value)}
                    className="px-4 py-2 rounded-xl border border-slate-200 text-sm text-slate-700 normal-case tracking-normal font-medium"
                  />
                </label>
                <label className="flex flex-col gap-1 text-xs font-bold text-slate-400 uppercase tracking-widest">
                  <span className="flex items-center gap-1"><CalendarDays className="w-3.5 h-3.5" /> To</span>
                  <input
                    type="date"
                    value={endDate}
                    onChange={e => setEndDate(e.target.value)}
                    className="px-4 py-2 rounded-xl border border-slate-200 text-sm text-slate-700 normal-case tracking-normal font-medium"
                  />
                </label>
                <label className="flex flex-col gap-1 text-xs font-bold text-slate-400 uppercase tracking-widest">
                  <span className="flex items-center gap-1"><MapPin className="w-3.5 h-3.5" /> Location</span>
                  <select
                    value={location}
                    onChange={e => setLocation(e.target.value)}
                    className="px-4 py-2 rounded-xl border border-slate-200 text-sm text-slate-700 normal-case tracking-normal font-medium"
                  >
                    <option value={ALL_LOCATIONS}>All locations</option>
                    {catalog.locations.map(name => (
                      <option key={name} value={name}>{name}</option>
                    ))}
                  </select>
                </label>
                <label className="flex items-center gap-2 text-sm font-medium text-slate-600 md:ml-auto">
                  <input
                    type="checkbox"
                    checked={showExtended}
                    onChange={e => setShowExtended(e.target.checked)}
                    className="accent-emerald-600"
                  />
                  Show extended metrics
                </label>
              </div>

              {catalog.excludedCount > 0 && (
                <div className="p-4 rounded-2xl bg-amber-50 border border-amber-100 text-xs text-amber-800 flex items-center gap-3">
                  <Info className="w-4 h-4 shrink-0" />
                  {catalog.excludedCount} record(s) excluded: their locations have no known coordinates.
                </div>
              )}

              {forecasts?.state === 'no-data' && (
                <div className="bg-white rounded-[2.5rem] p-10 shadow-sm border border-slate-100 text-center text-slate-500">
                  No data for this filter.
                </div>
              )}

              {forecasts?.state === 'ok' && (
                <>
                  {/* Metric cards */}
                  <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-4 gap-4">
                    <div className="p-5 rounded-3xl bg-orange-50 border border-orange-100 flex items-center gap-4">
                      <div className="p-3 rounded-2xl bg-white text-orange-500 shadow-sm"><Thermometer className="w-5 h-5" /></div>
                      <div>
                        <p className="text-[10px] font-bold text-orange-400 uppercase tracking-wider">Avg Max Temp</p>
                        <p className="text-xl font-bold text-orange-900">{forecasts.aggregates.avgMaxTemp.toFixed(1)}°C</p>
                      </div>
                    </div>
                    <div className="p-5 rounded-3xl bg-blue-50 border border-blue-100 flex items-center gap-4">
                      <div className="p-3 rounded-2xl bg-white text-blue-500 shadow-sm"><ThermometerSnowflake className="w-5 h-5" /></div>
                      <div>
                        <p className="text-[10px] font-bold text-blue-400 uppercase tracking-wider">Avg Min Temp</p>
                        <p className="text-xl font-bold text-blue-900">{forecasts.aggregates.avgMinTemp.toFixed(1)}°C</p>
                      </div>
                    </div>
                    {showExtended && (
                      <>
                        <div className="p-5 rounded-3xl bg-emerald-50 border border-emerald-100 flex items-center gap-4">
                          <div className="p-3 rounded-2xl bg-white text-emerald-500 shadow-sm"><Sprout className="w-5 h-5" /></div>
                          <div>
                            <p className="text-[10px] font-bold text-emerald-500 uppercase tracking-wider">Growing Degree Days</p>
                            <p className="text-xl font-bold text-emerald-900">{forecasts.aggregates.growingDegreeDays.toFixed(1)}</p>
                          </div>
                        </div>
                        <div className="p-5 rounded-3xl bg-slate-50 border border-slate-100 flex items-center gap-4">
                          <div className="p-3 rounded-2xl bg-white text-slate-500 shadow-sm"><Droplets className="w-5 h-5" /></div>
                          <div>
                            <p className="text-[10px] font-bold text-slate-400 uppercase tracking-wider">Humidity Index (simulated)</p>
                            <p className="text-xl font-bold text-slate-900">{forecasts.aggregates.humidityIndex.toFixed(0)}%</p>
                          </div>
                        </div>
                      </>
                    )}
                  </div>

                  {/* Map */}
                  <div className="bg-white rounded-2xl md:rounded-[2.5rem] p-6 shadow-sm border border-slate-100">
                    <ForecastMap records={forecasts.records} />
                  </div>

                  {/* Table */}
                  <div className="bg-white rounded-2xl md:rounded-[2.5rem] p-6 md:p-8 shadow-sm border border-slate-100 overflow-x-auto">
                    <table className="w-full text-sm">
                      <thead>
                        <tr className="text-left text-[10px] font-bold text-slate-400 uppercase tracking-widest">
                          <th className="py-2 pr-4">Date</th>
                          <th className="py-2 pr-4">Location</th>
                          <th className="py-2 pr-4">Min</th>
                          <th className="py-2 pr-4">Max</th>
                          <th className="py-2 pr-4">Conditions</th>
                          <th className="py-2">Lat / Lon</th>
                        </tr>
                      </thead>
                      <tbody>
                        {forecasts.records.map(record => (
                          <tr key={`${record.id}-${record.date}`} className="border-t border-slate-100 text-slate-700">
                            <td className="py-2 pr-4 font-mono text-xs">{record.date}</td>
                            <td className="py-2 pr-4 font-medium">{record.location}</td>
                            <td className="py-2 pr-4">{record.min_temp}°C</td>
                            <td className="py-2 pr-4">{record.max_temp}°C</td>
                            <td className="py-2 pr-4">{record.description}</td>
                            <td className="py-2 font-mono text-xs text-slate-400">
                              {record.lat.toFixed(4)}, {record.lon.toFixed(4)}
                            </td>
                          </tr>
                        ))}
                      </tbody>
                    </table>
                    <p className="text-[10px] text-slate-400 mt-4">
                      Dates are a rolling display window, not forecast issue dates.
                    </p>
                  </div>
                </>
              )}
            </motion.div>
          ) : null}
        </AnimatePresence>
      </main>
    </div>
  );
}
